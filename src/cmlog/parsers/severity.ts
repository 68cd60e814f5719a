/**
 * Severity carried in the `type` attribute.
 */
export type Severity = 1 | 2 | 3;

export type SeverityName = "Info" | "Warn" | "Error";

export const SEVERITY_NAMES: Record<Severity, SeverityName> = {
  1: "Info",
  2: "Warn",
  3: "Error",
};

const SEVERITY_ALIASES: Record<string, Severity> = {
  "1": 1,
  info: 1,
  "2": 2,
  warn: 2,
  warning: 2,
  "3": 3,
  error: 3,
};

/**
 * Reads a severity given by name or number (`warn`, `3`), case-insensitively.
 */
export function parseSeverityName(value: string): Severity | undefined {
  return SEVERITY_ALIASES[value.trim().toLowerCase()];
}
