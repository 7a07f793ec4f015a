/**
 * Shared test fixture: three known cities in two provinces, one place with
 * no province (4) and one id missing from the directory (9).
 */

import type { FlowRecord, Place } from "@odflow/types";
import { buildPlaceLookup } from "./place-lookup.js";

export const T1 = "2022-01-11T00:00:00Z";
export const T2 = "2022-01-12T00:00:00Z";

export const PLACES: Place[] = [
  { id: 1, name: "杭州", province: "浙江" },
  { id: 2, name: "宁波", province: "浙江" },
  { id: 3, name: "南京", province: "江苏" },
  { id: 4, name: "Mystery", province: null },
];

export const LOOKUP = buildPlaceLookup(PLACES);

function rec(
  time: string,
  originId: number,
  destinationId: number,
  flow: number | null,
): FlowRecord {
  return { time, type: "state", originId, destinationId, flow };
}

export const RECORDS: FlowRecord[] = [
  rec(T1, 1, 2, 10),
  rec(T1, 1, 3, 5),
  rec(T1, 3, 1, 5),
  rec(T1, 2, 4, 3),
  rec(T1, 9, 1, 2),
  rec(T2, 1, 2, 4),
  rec(T2, 3, 2, null),
];
