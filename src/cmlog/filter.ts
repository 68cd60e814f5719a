import type { CmTraceRecord, Severity } from "./parsers/index.js";
import { ConfigError } from "./errors.js";

/**
 * Filter criteria as supplied by the caller. All optional, combined with AND.
 */
export type FilterCriteria = {
  minLevel?: Severity;
  since?: Date;
  component?: string;
  /** Treat `component` as an unanchored regular expression */
  componentIsPattern?: boolean;
};

type ComponentMatcher =
  | { kind: "any" }
  | { kind: "literal"; value: string }
  | { kind: "pattern"; regex: RegExp };

/**
 * Criteria compiled once at pipeline setup.
 */
export type RecordFilter = {
  readonly minLevel: Severity;
  /** Epoch milliseconds, or undefined for no lower bound */
  readonly since?: number;
  readonly component: ComponentMatcher;
};

/**
 * Validates criteria and compiles the component pattern.
 * An invalid pattern is a configuration error, raised before any line is read.
 */
export function compileFilter(criteria: FilterCriteria = {}): RecordFilter {
  let since: number | undefined;
  if (criteria.since !== undefined) {
    since = criteria.since.getTime();
    if (Number.isNaN(since)) {
      throw new ConfigError("Invalid since timestamp");
    }
  }

  let component: ComponentMatcher = { kind: "any" };
  if (criteria.component !== undefined) {
    if (criteria.componentIsPattern) {
      try {
        component = { kind: "pattern", regex: new RegExp(criteria.component) };
      } catch (err) {
        throw new ConfigError(`Invalid component pattern: ${criteria.component}`, { cause: err });
      }
    } else {
      component = { kind: "literal", value: criteria.component };
    }
  }

  return {
    minLevel: criteria.minLevel ?? 1,
    since,
    component,
  };
}

function matchesComponent(record: CmTraceRecord, matcher: ComponentMatcher): boolean {
  switch (matcher.kind) {
    case "any":
      return true;
    case "literal":
      return record.component === matcher.value;
    case "pattern":
      return record.component !== undefined && matcher.regex.test(record.component);
  }
}

/**
 * Pure predicate. Records without a timestamp are never excluded by `since`.
 */
export function matchesFilter(record: CmTraceRecord, filter: RecordFilter): boolean {
  if (record.level < filter.minLevel) {
    return false;
  }
  if (filter.since !== undefined && record.timestampLocal !== undefined) {
    if (Date.parse(record.timestampLocal) < filter.since) {
      return false;
    }
  }
  return matchesComponent(record, filter.component);
}
