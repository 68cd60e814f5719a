import { format, isValid, parse } from "date-fns";

/**
 * Accepted `date time` layouts, tried in order. The agent is not consistent
 * about zero-padding month and day across versions.
 */
export const TIMESTAMP_FORMATS = [
  "MM-dd-yyyy HH:mm:ss.SSS",
  "MM-dd-yyyy HH:mm:ss",
  "M-d-yyyy HH:mm:ss.SSS",
  "M-d-yyyy HH:mm:ss",
] as const;

const LOCAL_ISO_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSxxx";

const OFFSET_SUFFIX = /[+-]\d+$/;
const FRACTION = /\.(\d+)$/;

export type ReconstructedTimestamp = {
  /** Instant read as wall-clock time in this machine's zone */
  local: Date;
  timestampLocal: string;
  timestampUtc: string;
};

/**
 * Removes a trailing signed minute offset, e.g. `14:22:01.500-300` -> `14:22:01.500`.
 */
export function stripOffsetSuffix(time: string): string {
  return time.replace(OFFSET_SUFFIX, "");
}

// date-fns scales `SSS` by digit count, so `.5` would read as 5ms.
function normalizeFraction(time: string): string {
  return time.replace(FRACTION, (_match, digits: string) => {
    return `.${digits.slice(0, 3).padEnd(3, "0")}`;
  });
}

/**
 * Combines the `date` and `time` attributes into a local instant.
 * The offset suffix is discarded, not applied: producers write local wall-clock
 * time and the offset is frequently wrong. Logs copied from a machine in another
 * zone are therefore read as this machine's wall clock.
 */
export function reconstructTimestamp(
  date: string | undefined,
  time: string | undefined,
  referenceDate: Date = new Date(),
): ReconstructedTimestamp | undefined {
  const datePart = date?.trim();
  const timePart = time?.trim();
  if (!datePart || !timePart) {
    return undefined;
  }

  const combined = `${datePart} ${normalizeFraction(stripOffsetSuffix(timePart))}`;
  for (const pattern of TIMESTAMP_FORMATS) {
    const local = parse(combined, pattern, referenceDate);
    if (isValid(local)) {
      return {
        local,
        timestampLocal: format(local, LOCAL_ISO_FORMAT),
        timestampUtc: local.toISOString(),
      };
    }
  }
  return undefined;
}
