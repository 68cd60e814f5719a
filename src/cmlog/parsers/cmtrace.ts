import type { CmTraceAttributes, CmTraceParseResult, CmTraceRecord } from "./index.js";
import { SEVERITY_NAMES, type Severity } from "./severity.js";
import { reconstructTimestamp } from "./timestamp.js";

/**
 * `<![LOG[message]LOG]!><time="..." date="..." ...>`
 * The message match is non-greedy so attributes are never swallowed into it.
 */
const LINE_PATTERN = /<!\[LOG\[(.*?)\]LOG\]!>(.*)$/s;
const ATTRIBUTE_PATTERN = /([A-Za-z_][\w-]*)="([^"]*)"/g;

const KNOWN_ATTRIBUTES: ReadonlySet<string> = new Set<keyof CmTraceAttributes>([
  "time",
  "date",
  "component",
  "type",
  "thread",
  "file",
  "line",
]);

function isKnownAttribute(key: string): key is keyof CmTraceAttributes {
  return KNOWN_ATTRIBUTES.has(key);
}

function extractAttributes(region: string): CmTraceAttributes {
  const attributes: CmTraceAttributes = {};
  for (const match of region.matchAll(ATTRIBUTE_PATTERN)) {
    const key = match[1];
    const value = match[2];
    // Unknown attributes (context, etc.) are ignored.
    if (key === undefined || value === undefined || !isKnownAttribute(key)) {
      continue;
    }
    if (attributes[key] === undefined) {
      attributes[key] = value;
    }
  }
  return attributes;
}

/**
 * Maps a `type` attribute to a severity. Anything other than 1, 2 or 3 is Info.
 */
export function toSeverity(value: string | undefined): Severity {
  const trimmed = value?.trim() ?? "";
  if (!/^\d+$/.test(trimmed)) {
    return 1;
  }
  const parsed = Number(trimmed);
  if (parsed === 2 || parsed === 3) {
    return parsed;
  }
  return 1;
}

/**
 * Splits a line into the structured or fallback branch.
 */
export function parseCmTraceLine(line: string): CmTraceParseResult {
  const match = LINE_PATTERN.exec(line);
  if (!match) {
    return { kind: "fallback", message: line.trim() };
  }
  return {
    kind: "structured",
    message: match[1] ?? "",
    attributes: extractAttributes(match[2] ?? ""),
  };
}

/**
 * Flattens a parse result into the public record shape.
 */
export function toRecord(result: CmTraceParseResult, raw: string): CmTraceRecord {
  if (result.kind === "fallback") {
    return {
      level: 1,
      levelName: SEVERITY_NAMES[1],
      message: result.message,
      raw,
    };
  }

  const { attributes } = result;
  const level = toSeverity(attributes.type);
  const timestamp = reconstructTimestamp(attributes.date, attributes.time);

  const record: {
    -readonly [K in keyof CmTraceRecord]: CmTraceRecord[K];
  } = {
    level,
    levelName: SEVERITY_NAMES[level],
    message: result.message,
    raw,
  };
  if (timestamp) {
    record.timestampLocal = timestamp.timestampLocal;
    record.timestampUtc = timestamp.timestampUtc;
  }
  if (attributes.date !== undefined) {
    record.dateRaw = attributes.date;
  }
  if (attributes.component !== undefined) {
    record.component = attributes.component;
  }
  if (attributes.thread !== undefined) {
    record.thread = attributes.thread;
  }
  if (attributes.file !== undefined) {
    record.sourceFile = attributes.file;
  }
  if (attributes.line !== undefined) {
    record.sourceLine = attributes.line;
  }
  return record;
}

/**
 * Parses one line. Total: every input yields exactly one record.
 */
export function parseLine(line: string): CmTraceRecord {
  return toRecord(parseCmTraceLine(line), line);
}

/**
 * Parses multiple lines, one record per line, in order.
 */
export function parseLines(lines: Iterable<string>): CmTraceRecord[] {
  const records: CmTraceRecord[] = [];
  for (const line of lines) {
    records.push(parseLine(line));
  }
  return records;
}
