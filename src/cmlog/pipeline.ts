import type { CmTraceRecord } from "./parsers/index.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { compileFilter, matchesFilter, type RecordFilter } from "./filter.js";
import { formatRecord } from "./formatter.js";
import { openLineSource } from "./line-source.js";
import { resolveTailOptions, type ResolvedTailOptions, type TailOptions } from "./options.js";
import { parseLine } from "./parsers/index.js";

const log = createSubsystemLogger("cmlog/pipeline");

export type TailOutput = CmTraceRecord | string;

/**
 * Receives each emitted record (object mode) or line (text mode), in order.
 */
export type LogSink = (output: TailOutput) => void | Promise<void>;

export type TailStats = {
  /** Non-blank lines parsed */
  scanned: number;
  /** Records that passed the filter */
  emitted: number;
};

/**
 * Reads one log file through source -> parser -> filter -> formatter.
 * Options are validated on construction, before the file is touched.
 */
export class LogTail {
  readonly options: ResolvedTailOptions;
  private readonly filter: RecordFilter;
  private readonly controller = new AbortController();
  private readonly stats: TailStats = { scanned: 0, emitted: 0 };
  private started = false;
  private readonly onExternalAbort = () => this.controller.abort();

  constructor(options: TailOptions) {
    this.options = resolveTailOptions(options);
    this.filter = compileFilter({
      minLevel: this.options.minLevel,
      since: this.options.since,
      component: this.options.component,
      componentIsPattern: this.options.componentIsPattern,
    });

    const external = this.options.signal;
    if (external) {
      if (external.aborted) {
        this.controller.abort();
      } else {
        external.addEventListener("abort", this.onExternalAbort, { once: true });
      }
    }
  }

  /**
   * Parsed records that pass the filter, in file order.
   * Single use: a tail cannot be restarted once consumed.
   */
  async *records(): AsyncGenerator<CmTraceRecord> {
    if (this.started) {
      throw new Error("Log tail already started");
    }
    this.started = true;

    const { path, mode, pollIntervalMs, watch, usePolling } = this.options;
    log.debug(`Reading ${path}`, { mode: mode.kind });

    const lines = openLineSource(path, mode, {
      pollIntervalMs,
      watch,
      usePolling,
      signal: this.controller.signal,
    });
    try {
      for await (const line of lines) {
        if (line.trim() === "") {
          continue;
        }
        this.stats.scanned += 1;
        const record = parseLine(line);
        if (!matchesFilter(record, this.filter)) {
          continue;
        }
        this.stats.emitted += 1;
        yield record;
      }
    } finally {
      this.options.signal?.removeEventListener("abort", this.onExternalAbort);
    }
  }

  /**
   * Records in object mode, rendered lines in text mode.
   */
  async *output(): AsyncGenerator<TailOutput> {
    const color = !this.options.noColor;
    for await (const record of this.records()) {
      yield formatRecord(record, this.options.output, { color });
    }
  }

  /**
   * Writes every output to `sink` as it arrives.
   */
  async pipeTo(sink: LogSink): Promise<TailStats> {
    for await (const item of this.output()) {
      await sink(item);
    }
    log.debug(`Finished ${this.options.path}`, { ...this.stats });
    return this.status();
  }

  /**
   * Ends follow mode. Lines already emitted stay emitted.
   */
  stop(): void {
    this.controller.abort();
  }

  status(): TailStats {
    return { ...this.stats };
  }
}

/**
 * Creates a log tail; throws `ConfigError` for invalid options.
 */
export function createLogTail(options: TailOptions): LogTail {
  return new LogTail(options);
}
