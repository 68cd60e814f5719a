import fs from "node:fs/promises";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { NotFoundError, ReadFailureError, isCmLogError, isErrnoException } from "./errors.js";
import { readLastLines, readLines } from "./tail-reader.js";
import { createGrowthWatcher, type GrowthWatcherOptions } from "./watcher.js";

const log = createSubsystemLogger("cmlog/line-source");

export const DEFAULT_POLL_INTERVAL_MS = 250;

/**
 * How much of the file to produce. Modes are mutually exclusive.
 */
export type LineSourceMode =
  | { kind: "whole" }
  | { kind: "tail"; lines: number }
  | { kind: "follow" };

export type LineSourceOptions = {
  /** Upper bound on how long follow mode waits before re-checking the file */
  pollIntervalMs?: number;
  /** Ends follow mode; the pending wait is released immediately */
  signal?: AbortSignal;
} & Pick<GrowthWatcherOptions, "watch" | "usePolling">;

function toReadFailure(file: string, err: unknown): Error {
  if (isCmLogError(err)) {
    return err;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new ReadFailureError(file, reason, { cause: err });
}

async function statFile(file: string): Promise<number> {
  try {
    const stat = await fs.stat(file);
    return stat.size;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new NotFoundError(file, { cause: err });
    }
    throw toReadFailure(file, err);
  }
}

async function* wholeFile(file: string, size: number): AsyncGenerator<string> {
  try {
    for await (const chunk of readLines({ file, end: size })) {
      yield chunk.line;
    }
  } catch (err) {
    throw toReadFailure(file, err);
  }
}

async function* tailFile(file: string, count: number): AsyncGenerator<string> {
  let lines: string[];
  try {
    lines = await readLastLines({ file, count });
  } catch (err) {
    throw toReadFailure(file, err);
  }
  yield* lines;
}

async function* followFile(
  file: string,
  initialSize: number,
  options: LineSourceOptions,
): AsyncGenerator<string> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const signal = options.signal;
  const watcher = createGrowthWatcher(file, {
    watch: options.watch,
    usePolling: options.usePolling,
  });

  let cursor = 0;
  let size = initialSize;
  let seenSize = 0;
  try {
    while (!signal?.aborted) {
      if (size < seenSize) {
        log.warn(`File shrank from ${seenSize} to ${size} bytes: ${file}`);
        throw new ReadFailureError(file, "file was truncated or rotated");
      }
      if (size > seenSize) {
        seenSize = size;
        try {
          const appended = readLines({ file, start: cursor, end: size, holdPartial: true });
          for await (const chunk of appended) {
            cursor = chunk.end;
            yield chunk.line;
            if (signal?.aborted) {
              return;
            }
          }
        } catch (err) {
          throw toReadFailure(file, err);
        }
      } else {
        await watcher.waitForChange(pollIntervalMs, signal);
      }
      if (signal?.aborted) {
        break;
      }
      try {
        size = (await fs.stat(file)).size;
      } catch (err) {
        throw toReadFailure(file, err);
      }
    }
  } finally {
    await watcher.close();
    log.debug(`Stopped following ${file}`, { cursor });
  }
}

/**
 * Produces raw lines from `file` under the given mode.
 * The path is checked on the first `next()`; a missing file raises
 * `NotFoundError` before any line is produced.
 */
export async function* openLineSource(
  file: string,
  mode: LineSourceMode,
  options: LineSourceOptions = {},
): AsyncGenerator<string> {
  const size = await statFile(file);
  log.debug(`Opening ${file} (${mode.kind})`, { size });

  switch (mode.kind) {
    case "whole":
      yield* wholeFile(file, size);
      return;
    case "tail":
      yield* tailFile(file, mode.lines);
      return;
    case "follow":
      yield* followFile(file, size, options);
      return;
  }
}
