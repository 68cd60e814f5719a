/**
 * CMTrace log reader.
 *
 * Parses `<![LOG[message]LOG]!><time="..." date="..." component="..." type="1" ...>`
 * lines, filters them by severity, component and time, and emits records or
 * formatted text. Follow mode keeps reading as the agent appends.
 *
 * @example
 * ```ts
 * import { createLogTail } from "./cmlog/index.js";
 *
 * const controller = new AbortController();
 * const tail = createLogTail({
 *   path: "C:/ProgramData/Agent/Logs/AgentExecutor.log",
 *   mode: { kind: "follow" },
 *   minLevel: 2,
 *   component: "Win32App",
 *   signal: controller.signal,
 * });
 *
 * for await (const line of tail.output()) {
 *   console.log(line);
 * }
 * ```
 */

// Orchestrator
export {
  LogTail,
  createLogTail,
  type LogSink,
  type TailOutput,
  type TailStats,
} from "./pipeline.js";

// Options
export {
  TailOptionsSchema,
  resolveTailOptions,
  type OutputMode,
  type ResolvedTailOptions,
  type TailOptions,
} from "./options.js";

// Errors
export {
  CmLogError,
  ConfigError,
  NotFoundError,
  ReadFailureError,
  isCmLogError,
  type CmLogErrorCode,
} from "./errors.js";

// Filter
export {
  compileFilter,
  matchesFilter,
  type FilterCriteria,
  type RecordFilter,
} from "./filter.js";

// Formatter
export {
  MISSING_FIELD,
  TIMESTAMP_PLACEHOLDER,
  formatDisplayTimestamp,
  formatRecord,
  formatRecordText,
  type TextFormatOptions,
} from "./formatter.js";

// Line source
export {
  DEFAULT_POLL_INTERVAL_MS,
  openLineSource,
  type LineSourceMode,
  type LineSourceOptions,
} from "./line-source.js";

// Tail reader
export {
  readLastLines,
  readLines,
  readLogSlice,
  type LineChunk,
  type TailReadResult,
} from "./tail-reader.js";

// Watcher
export { createGrowthWatcher, type GrowthWatcher, type GrowthWatcherOptions } from "./watcher.js";

// Parsers
export {
  SEVERITY_NAMES,
  TIMESTAMP_FORMATS,
  parseCmTraceLine,
  parseLine,
  parseLines,
  parseSeverityName,
  reconstructTimestamp,
  stripOffsetSuffix,
  toRecord,
  toSeverity,
  type CmTraceAttributes,
  type CmTraceParseResult,
  type CmTraceRecord,
  type ReconstructedTimestamp,
  type Severity,
  type SeverityName,
} from "./parsers/index.js";
