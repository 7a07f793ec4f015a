/**
 * Dense tensor construction from sparse flow scans.
 *
 * Scan rows -> distinct time axis -> pre-filled [T, N, N] -> cell writes.
 *
 * Cells are written in scan order, so when several rows land on the same
 * (time, origin, destination) cell the last one wins. Rows are never summed.
 */

import type {
  DenseIndex,
  FlowPolicy,
  FlowRecord,
  OdTensor,
  PairSeries,
} from "@odflow/types";
import { buildTimeAxis } from "../time/time-axis.js";

export interface TensorBuildOptions {
  flowPolicy: FlowPolicy;
  /** Applied to present flow values only (used by the prediction mock) */
  transform?: (flow: number) => number;
}

type CellWrite = { write: true; value: number | null } | { write: false };

/** Value every cell starts with before any row is written */
export function defaultCellValue(policy: FlowPolicy): number | null {
  return policy === "zero" ? 0 : null;
}

/** Decide what a single scanned flow value writes into its cell */
export function resolveCellWrite(
  flow: number | null,
  options: TensorBuildOptions,
): CellWrite {
  if (flow !== null) {
    const value = options.transform ? options.transform(flow) : flow;
    return { write: true, value };
  }
  switch (options.flowPolicy) {
    case "skip":
      return { write: false };
    case "null":
      return { write: true, value: null };
    case "zero":
      return { write: true, value: 0 };
  }
}

/**
 * Build the dense [T, N, N] tensor for the given index.
 *
 * The time axis covers every scanned row, including rows later discarded
 * because an end is missing from the index.
 */
export function buildOdTensor(
  records: readonly FlowRecord[],
  index: DenseIndex,
  options: TensorBuildOptions,
): OdTensor {
  const N = index.ids.length;
  if (records.length === 0) {
    return { T: 0, N, times: [], ids: index.ids, tensor: [] };
  }

  const axis = buildTimeAxis(records.map((r) => r.time));
  const T = axis.times.length;
  const fill = defaultCellValue(options.flowPolicy);

  const tensor: (number | null)[][][] = Array.from({ length: T }, () =>
    Array.from({ length: N }, () => new Array<number | null>(N).fill(fill)),
  );

  for (const record of records) {
    const i = index.indexOf.get(record.originId);
    const j = index.indexOf.get(record.destinationId);
    const t = axis.indexOf.get(record.time);
    if (i === undefined || j === undefined || t === undefined) continue;

    const cell = resolveCellWrite(record.flow, options);
    if (!cell.write) continue;
    const slice = tensor[t];
    const row = slice?.[i];
    if (row) row[j] = cell.value;
  }

  return { T, N, times: axis.times, ids: index.ids, tensor };
}

/**
 * Build the dense series for one ordered pair. Rows of other pairs are
 * ignored.
 */
export function buildPairSeries(
  records: readonly FlowRecord[],
  originId: number,
  destinationId: number,
  options: TensorBuildOptions,
): PairSeries {
  const pairRecords = records.filter(
    (r) => r.originId === originId && r.destinationId === destinationId,
  );
  if (pairRecords.length === 0) {
    return { T: 0, times: [], originId, destinationId, series: [] };
  }

  const axis = buildTimeAxis(pairRecords.map((r) => r.time));
  const series = new Array<number | null>(axis.times.length).fill(
    defaultCellValue(options.flowPolicy),
  );

  for (const record of pairRecords) {
    const t = axis.indexOf.get(record.time);
    if (t === undefined) continue;
    const cell = resolveCellWrite(record.flow, options);
    if (cell.write) series[t] = cell.value;
  }

  return {
    T: axis.times.length,
    times: axis.times,
    originId,
    destinationId,
    series,
  };
}
