import type { Severity, SeverityName } from "./severity.js";

export { parseCmTraceLine, parseLine, parseLines, toRecord, toSeverity } from "./cmtrace.js";
export {
  TIMESTAMP_FORMATS,
  reconstructTimestamp,
  stripOffsetSuffix,
  type ReconstructedTimestamp,
} from "./timestamp.js";

export {
  SEVERITY_NAMES,
  parseSeverityName,
  type Severity,
  type SeverityName,
} from "./severity.js";

/**
 * One parsed log line. Optional fields are omitted rather than null.
 */
export type CmTraceRecord = Readonly<{
  /** ISO-8601 UTC projection of the reconstructed instant */
  timestampUtc?: string;
  /** ISO-8601 wall clock with this machine's offset */
  timestampLocal?: string;
  /** `date` attribute as found */
  dateRaw?: string;
  component?: string;
  level: Severity;
  levelName: SeverityName;
  thread?: string;
  /** Source file named by the log line itself */
  sourceFile?: string;
  sourceLine?: string;
  message: string;
  /** Input line, untouched */
  raw: string;
}>;

/**
 * Attributes recognised after the message close marker.
 */
export type CmTraceAttributes = {
  time?: string;
  date?: string;
  component?: string;
  type?: string;
  thread?: string;
  file?: string;
  line?: string;
};

export type CmTraceParseResult =
  | { kind: "structured"; message: string; attributes: CmTraceAttributes }
  | { kind: "fallback"; message: string };
