import { Logger, type ILogObj } from "tslog";

/**
 * tslog level ids, lowest first.
 */
const LEVEL_IDS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LEVEL_IDS;

const DEFAULT_LEVEL: LogLevelName = "warn";

function isLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LEVEL_IDS, value);
}

/**
 * Resolves the diagnostic log level from CMLOG_LOG_LEVEL.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevelName {
  const raw = env.CMLOG_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLevelName(raw)) {
    return raw;
  }
  return DEFAULT_LEVEL;
}

let rootLogger: Logger<ILogObj> | null = null;

function renderArg(arg: unknown): string {
  if (typeof arg === "string") {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.message;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

function readMeta(value: unknown): { name?: string; level?: string } {
  if (!value || typeof value !== "object") {
    return {};
  }
  const meta = value as { name?: unknown; logLevelName?: unknown };
  return {
    name: typeof meta.name === "string" ? meta.name : undefined,
    level: typeof meta.logLevelName === "string" ? meta.logLevelName : undefined,
  };
}

function getRootLogger(): Logger<ILogObj> {
  if (rootLogger) {
    return rootLogger;
  }
  // Records go to stdout; diagnostics must never interleave with them.
  const logger = new Logger<ILogObj>({
    name: "cmlog",
    type: "hidden",
    minLevel: LEVEL_IDS[resolveLogLevel()],
  });
  logger.attachTransport((logObj) => {
    const meta = readMeta(logObj._meta);
    const args: string[] = [];
    for (let i = 0; Object.hasOwn(logObj, String(i)); i += 1) {
      args.push(renderArg(logObj[String(i)]));
    }
    const name = meta.name ?? "cmlog";
    const level = meta.level ?? "INFO";
    process.stderr.write(`${level.padEnd(5)} [${name}] ${args.join(" ")}\n`);
  });
  rootLogger = logger;
  return logger;
}

export type SubsystemLogger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

/**
 * Creates a logger scoped to a subsystem, e.g. `cmlog/line-source`.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let sub: Logger<ILogObj> | null = null;
  const logger = () => {
    sub ??= getRootLogger().getSubLogger({ name: subsystem });
    return sub;
  };
  const emit =
    (level: "debug" | "info" | "warn" | "error") =>
    (message: string, meta?: Record<string, unknown>) => {
      if (meta) {
        logger()[level](message, meta);
      } else {
        logger()[level](message);
      }
    };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
