import { Chalk, type ChalkInstance } from "chalk";
import { format, parseISO } from "date-fns";
import type { CmTraceRecord, Severity } from "./parsers/index.js";
import type { OutputMode } from "./options.js";

const DISPLAY_TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss.SSS";

/** Stands in for a missing timestamp; same width as a rendered one */
export const TIMESTAMP_PLACEHOLDER = ".".repeat(DISPLAY_TIMESTAMP_FORMAT.length);
export const MISSING_FIELD = "-";

export type TextFormatOptions = {
  color?: boolean;
};

type Palette = Record<Severity, (text: string) => string>;

function createPalette(chalk: ChalkInstance): Palette {
  return {
    1: (text) => text,
    2: chalk.yellow,
    3: chalk.red,
  };
}

const palettes = {
  plain: createPalette(new Chalk({ level: 0 })),
  color: createPalette(new Chalk({ level: 1 })),
};

// Empty attribute values render like missing ones.
function orMissing(value: string | undefined): string {
  return value === undefined || value === "" ? MISSING_FIELD : value;
}

/**
 * Renders the record's local timestamp on this machine's clock.
 */
export function formatDisplayTimestamp(record: CmTraceRecord): string {
  if (record.timestampLocal === undefined) {
    return TIMESTAMP_PLACEHOLDER;
  }
  return format(parseISO(record.timestampLocal), DISPLAY_TIMESTAMP_FORMAT);
}

/**
 * One line of text:
 * `[timestamp] [component] [Level] [thread] (file:line)  message`
 */
export function formatRecordText(record: CmTraceRecord, options: TextFormatOptions = {}): string {
  const location =
    record.sourceFile && record.sourceLine
      ? ` (${record.sourceFile}:${record.sourceLine})`
      : "";
  const text =
    `[${formatDisplayTimestamp(record)}] ` +
    `[${orMissing(record.component)}] ` +
    `[${record.levelName}] ` +
    `[${orMissing(record.thread)}]` +
    `${location}  ${record.message}`;

  const palette = options.color ? palettes.color : palettes.plain;
  return palette[record.level](text);
}

/**
 * Object mode hands the record back untouched; text mode renders it.
 */
export function formatRecord(
  record: CmTraceRecord,
  output: OutputMode,
  options: TextFormatOptions = {},
): CmTraceRecord | string {
  if (output === "object") {
    return record;
  }
  return formatRecordText(record, options);
}
