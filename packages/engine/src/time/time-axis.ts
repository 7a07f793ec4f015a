/**
 * Request-scoped time axis.
 *
 * The axis holds the distinct timestamp strings of a scan. Strings are
 * ordered by the instant they denote, so mixed offsets still sort
 * chronologically; strings for the same instant are ordered lexically.
 * Strings that do not parse sort after all parseable ones, lexically.
 */

import { tryParseIsoTimestamp } from "./iso.js";

export interface TimeAxis {
  times: string[];
  indexOf: ReadonlyMap<string, number>;
}

function lexical(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Build a comparator that caches parsed epochs per string */
export function timestampComparator(): (a: string, b: string) => number {
  const epochs = new Map<string, number | null>();
  const epochOf = (s: string): number | null => {
    let epoch = epochs.get(s);
    if (epoch === undefined) {
      epoch = tryParseIsoTimestamp(s);
      epochs.set(s, epoch);
    }
    return epoch;
  };

  return (a, b) => {
    const ea = epochOf(a);
    const eb = epochOf(b);
    if (ea !== null && eb !== null) return ea - eb || lexical(a, b);
    if (ea !== null) return -1;
    if (eb !== null) return 1;
    return lexical(a, b);
  };
}

export function buildTimeAxis(timestamps: Iterable<string>): TimeAxis {
  const times = [...new Set(timestamps)].sort(timestampComparator());
  const indexOf = new Map<string, number>();
  times.forEach((t, i) => indexOf.set(t, i));
  return { times, indexOf };
}
