/**
 * Flow aggregation and ranking by province or city.
 *
 * Records are keyed by the origin (send) or destination (receive) place,
 * summed per key - per timestamp in daily mode - and ranked with "min"
 * competition ranking. Places that cannot be resolved fall into the
 * "Unknown" group; their flow is kept. Missing flow values count as 0.
 */

import type {
  AggregatedFlowRow,
  DateMode,
  Direction,
  FlowRecord,
  GroupDimension,
} from "@odflow/types";
import { timestampComparator } from "../time/time-axis.js";
import { cityKeyOf, provinceKeyOf, type PlaceLookup } from "./place-lookup.js";
import { withMinRanks } from "./ranking.js";

export interface FlowAggregationOptions {
  dimension: GroupDimension;
  direction: Direction;
  dateMode: DateMode;
}

/** Group key of one record for the chosen dimension and direction */
export function groupKeyOf(
  record: FlowRecord,
  lookup: PlaceLookup,
  dimension: GroupDimension,
  direction: Direction,
): string {
  const id = direction === "send" ? record.originId : record.destinationId;
  return dimension === "province" ? provinceKeyOf(lookup, id) : cityKeyOf(lookup, id);
}

function addFlow(sums: Map<string, number>, key: string, flow: number): void {
  sums.set(key, (sums.get(key) ?? 0) + flow);
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function aggregateFlows(
  records: readonly FlowRecord[],
  lookup: PlaceLookup,
  options: FlowAggregationOptions,
): AggregatedFlowRow[] {
  const { dimension, direction, dateMode } = options;

  if (dateMode === "total") {
    const sums = new Map<string, number>();
    for (const record of records) {
      addFlow(sums, groupKeyOf(record, lookup, dimension, direction), record.flow ?? 0);
    }
    const rows = [...sums].map(([groupKey, flow]) => ({ groupKey, date: null, flow }));
    return withMinRanks(rows).sort(
      (a, b) => a.rank - b.rank || compareKeys(a.groupKey, b.groupKey),
    );
  }

  const byDate = new Map<string, Map<string, number>>();
  for (const record of records) {
    let sums = byDate.get(record.time);
    if (!sums) {
      sums = new Map();
      byDate.set(record.time, sums);
    }
    addFlow(sums, groupKeyOf(record, lookup, dimension, direction), record.flow ?? 0);
  }

  const ranked: AggregatedFlowRow[] = [];
  for (const [date, sums] of byDate) {
    const rows = [...sums].map(([groupKey, flow]) => ({ groupKey, date, flow }));
    ranked.push(...withMinRanks(rows));
  }

  const byTime = timestampComparator();
  return ranked.sort(
    (a, b) =>
      a.rank - b.rank ||
      byTime(a.date ?? "", b.date ?? "") ||
      compareKeys(a.groupKey, b.groupKey),
  );
}
