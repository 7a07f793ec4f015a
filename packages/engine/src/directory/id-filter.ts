import { OdflowError } from "../errors.js";

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Parse a comma-separated id list such as "1, 2,3".
 *
 * Blank tokens are ignored. Any other non-integer token, or a list with no
 * ids at all, fails with InvalidIdFilter.
 */
export function parseIdFilter(raw: string): number[] {
  const ids: number[] = [];
  for (const token of raw.split(",")) {
    const trimmed = token.trim();
    if (!trimmed) continue;
    const id = Number(trimmed);
    if (!INTEGER_TOKEN.test(trimmed) || !Number.isSafeInteger(id)) {
      throw new OdflowError("InvalidIdFilter", `invalid geo id "${trimmed}"`);
    }
    ids.push(id);
  }
  if (ids.length === 0) {
    throw new OdflowError("InvalidIdFilter", "geo id filter cannot be empty");
  }
  return ids;
}
