import { Command, InvalidArgumentError } from "commander";
import type { LineSourceMode } from "../cmlog/line-source.js";
import type { TailOptions } from "../cmlog/options.js";
import { parseSeverityName, type Severity } from "../cmlog/parsers/index.js";

const RELATIVE_SINCE = /^(\d+)([smhd])$/;

const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Raw option values as commander hands them to the action.
 */
export type CliOptions = {
  tail?: number;
  follow?: boolean;
  since?: Date;
  component?: string;
  componentPattern?: string;
  minLevel: Severity;
  json?: boolean;
  color: boolean;
  pollInterval?: number;
  usePolling?: boolean;
};

/**
 * Accepts an absolute time (`2025-01-15T09:00`) or a relative one (`30m`, `2h`, `1d`).
 */
export function parseSince(value: string, now: Date = new Date()): Date {
  const relative = RELATIVE_SINCE.exec(value.trim());
  if (relative) {
    const amount = Number(relative[1]);
    const unit = UNIT_MS[relative[2] ?? ""] ?? 0;
    return new Date(now.getTime() - amount * unit);
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError("Expected a date/time or a duration like 30m, 2h, 1d.");
  }
  return parsed;
}

export function parseMinLevel(value: string): Severity {
  const level = parseSeverityName(value);
  if (level === undefined) {
    throw new InvalidArgumentError("Expected info, warn, error or 1-3.");
  }
  return level;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Maps parsed CLI flags onto pipeline options.
 */
export function toTailOptions(
  path: string,
  options: CliOptions,
  isTty: boolean,
): TailOptions {
  let mode: LineSourceMode = { kind: "whole" };
  if (options.follow) {
    mode = { kind: "follow" };
  } else if (options.tail !== undefined) {
    mode = { kind: "tail", lines: options.tail };
  }

  const component = options.componentPattern ?? options.component;
  return {
    path,
    mode,
    since: options.since,
    component,
    componentIsPattern: options.componentPattern !== undefined,
    minLevel: options.minLevel,
    output: options.json ? "object" : "text",
    noColor: !options.color || !isTty,
    pollIntervalMs: options.pollInterval,
    usePolling: options.usePolling,
  };
}

/**
 * Builds the `cmlog` command. The action receives the resolved path and options.
 */
export function createProgram(
  action: (path: string, options: CliOptions) => Promise<void>,
): Command {
  const program = new Command();
  program
    .name("cmlog")
    .description("Parse, filter and follow CMTrace-style agent logs")
    .argument("<path>", "Log file to read")
    .option("-n, --tail <count>", "Only the last <count> lines", parsePositiveInt)
    .option("-f, --follow", "Keep reading as lines are appended (Ctrl+C to stop)")
    .option("--since <time>", "Skip records older than <time> (ISO date or 30m, 2h, 1d)", (value) =>
      parseSince(value),
    )
    .option("-c, --component <name>", "Only records from this component (exact match)")
    .option("--component-pattern <regex>", "Only records whose component matches <regex>")
    .option("-l, --min-level <level>", "Minimum severity: info, warn, error", parseMinLevel, 1)
    .option("--json", "Write records as JSON lines")
    .option("--no-color", "Disable severity colors")
    .option("--poll-interval <ms>", "Follow-mode poll interval in milliseconds", parsePositiveInt)
    .option("--use-polling", "Stat the file instead of using change events (network shares)")
    .action(async (path: string, options: CliOptions) => {
      if (options.follow && options.tail !== undefined) {
        program.error("error: --tail and --follow cannot be combined");
      }
      if (options.component !== undefined && options.componentPattern !== undefined) {
        program.error("error: --component and --component-pattern cannot be combined");
      }
      await action(path, options);
    });
  return program;
}
