import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_POLL_INTERVAL_MS } from "./line-source.js";

export const LineSourceModeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("whole") }),
  z.object({ kind: z.literal("tail"), lines: z.number().int().positive() }),
  z.object({ kind: z.literal("follow") }),
]);

export const SeveritySchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const OutputModeSchema = z.enum(["object", "text"]);

export const TailOptionsSchema = z
  .object({
    path: z.string().min(1),
    mode: LineSourceModeSchema.default({ kind: "whole" }),
    since: z.date().optional(),
    component: z.string().optional(),
    componentIsPattern: z.boolean().default(false),
    minLevel: SeveritySchema.default(1),
    output: OutputModeSchema.default("text"),
    /** Text mode only */
    noColor: z.boolean().default(false),
    pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
    watch: z.boolean().default(true),
    usePolling: z.boolean().default(false),
    signal: z.instanceof(AbortSignal).optional(),
  })
  .strict();

export type OutputMode = z.infer<typeof OutputModeSchema>;

/**
 * Options as accepted from callers; defaults are filled in by `resolveTailOptions`.
 */
export type TailOptions = z.input<typeof TailOptionsSchema>;

export type ResolvedTailOptions = z.output<typeof TailOptionsSchema>;

/**
 * Validates options, raising `ConfigError` with every issue found.
 */
export function resolveTailOptions(options: TailOptions): ResolvedTailOptions {
  const result = TailOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid options: ${issues}`, { cause: result.error });
  }
  return result.data;
}
