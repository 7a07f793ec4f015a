/**
 * Corridor analysis - top origin -> destination pairs by summed flow.
 *
 * Corridors have no time dimension: flow is summed over the whole window
 * per ordered (send, arrive) pair, ranked, and truncated to top-K.
 */

import type {
  CityCorridorRow,
  CityCorridorTables,
  CorridorRow,
  CorridorType,
  FlowRecord,
} from "@odflow/types";
import {
  cityKeyOf,
  knownProvinceOf,
  provinceKeyOf,
  type PlaceLookup,
} from "./place-lookup.js";
import { withMinRanks } from "./ranking.js";

export const DEFAULT_PROVINCE_TOPK = 10;
export const DEFAULT_INTRA_TOPK = 10;
export const DEFAULT_INTER_TOPK = 30;

export interface CityCorridorOptions {
  topkIntra?: number;
  topkInter?: number;
}

interface PairSum {
  sendKey: string;
  arriveKey: string;
  flow: number;
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Rank pair sums, order by rank then keys, and keep the first topk */
function rankAndTruncate<T extends PairSum>(pairs: Iterable<T>, topk: number) {
  return withMinRanks([...pairs])
    .sort(
      (a, b) =>
        a.rank - b.rank ||
        compareKeys(a.sendKey, b.sendKey) ||
        compareKeys(a.arriveKey, b.arriveKey),
    )
    .slice(0, Math.max(0, topk));
}

/** Top-K province -> province corridors; unresolved provinces are "Unknown" */
export function provinceCorridors(
  records: readonly FlowRecord[],
  lookup: PlaceLookup,
  topk: number = DEFAULT_PROVINCE_TOPK,
): CorridorRow[] {
  const sums = new Map<string, PairSum>();
  for (const record of records) {
    const sendKey = provinceKeyOf(lookup, record.originId);
    const arriveKey = provinceKeyOf(lookup, record.destinationId);
    const key = JSON.stringify([sendKey, arriveKey]);
    const pair = sums.get(key) ?? { sendKey, arriveKey, flow: 0 };
    pair.flow += record.flow ?? 0;
    sums.set(key, pair);
  }

  return rankAndTruncate(sums.values(), topk).map(({ sendKey, arriveKey, flow, rank }) => ({
    sendKey,
    arriveKey,
    flow,
    rank,
  }));
}

/**
 * Top-K city -> city corridors split into intra-province and
 * inter-province lists, ranked independently.
 *
 * Pairs are grouped by city and province on both ends, so two cities that
 * share a name but not a province stay separate. Records with an unknown
 * province on either end are in neither list.
 */
export function cityCorridors(
  records: readonly FlowRecord[],
  lookup: PlaceLookup,
  options: CityCorridorOptions = {},
): CityCorridorTables {
  const topkIntra = options.topkIntra ?? DEFAULT_INTRA_TOPK;
  const topkInter = options.topkInter ?? DEFAULT_INTER_TOPK;

  const intra = new Map<string, PairSum>();
  const inter = new Map<string, PairSum>();

  for (const record of records) {
    const sendProvince = knownProvinceOf(lookup, record.originId);
    const arriveProvince = knownProvinceOf(lookup, record.destinationId);
    if (sendProvince === null || arriveProvince === null) continue;

    const sendKey = cityKeyOf(lookup, record.originId);
    const arriveKey = cityKeyOf(lookup, record.destinationId);
    const bucket = sendProvince === arriveProvince ? intra : inter;
    const key = JSON.stringify([sendKey, sendProvince, arriveKey, arriveProvince]);
    const pair = bucket.get(key) ?? { sendKey, arriveKey, flow: 0 };
    pair.flow += record.flow ?? 0;
    bucket.set(key, pair);
  }

  const tag =
    (corridorType: CorridorType) =>
    ({ sendKey, arriveKey, flow, rank }: PairSum & { rank: number }): CityCorridorRow => ({
      sendKey,
      arriveKey,
      flow,
      rank,
      corridorType,
    });

  return {
    intraProvince: rankAndTruncate(intra.values(), topkIntra).map(tag("intra_province")),
    interProvince: rankAndTruncate(inter.values(), topkInter).map(tag("inter_province")),
  };
}
