/**
 * Dense N x N relations matrix from sparse cost edges.
 */

import type { DenseIndex, RelationEdge, RelationsMatrix } from "@odflow/types";
import { OdflowError } from "../errors.js";

const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse the fill value for cells without an edge.
 * "nan" (any case) means null; otherwise a finite float literal.
 */
export function parseFillValue(fill: string): number | null {
  const trimmed = fill.trim();
  if (trimmed.toLowerCase() === "nan") return null;

  const value = Number(trimmed);
  if (!FLOAT_LITERAL.test(trimmed) || !Number.isFinite(value)) {
    throw new OdflowError(
      "InvalidFillValue",
      "invalid fill value; use 'nan' or a float",
    );
  }
  return value;
}

/**
 * matrix[i][j] = cost(ids[i] -> ids[j]). Edges with an end outside the
 * index are dropped; a later edge for the same pair overwrites an earlier one.
 */
export function buildRelationsMatrix(
  edges: Iterable<RelationEdge>,
  index: DenseIndex,
  fill: number | null,
): RelationsMatrix {
  const N = index.ids.length;
  const matrix: (number | null)[][] = Array.from({ length: N }, () =>
    new Array<number | null>(N).fill(fill),
  );

  for (const edge of edges) {
    const i = index.indexOf.get(edge.originId);
    const j = index.indexOf.get(edge.destinationId);
    if (i === undefined || j === undefined) continue;
    const row = matrix[i];
    if (row) row[j] = edge.cost;
  }

  return { N, ids: index.ids, matrix };
}
