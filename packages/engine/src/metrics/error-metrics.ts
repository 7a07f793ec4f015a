/**
 * Error metrics between observed and predicted values.
 */

import { OdflowError } from "../errors.js";

/** A scalar or arbitrarily nested array of scalars */
export type NestedValues = number | null | readonly NestedValues[];

export interface ErrorMetrics {
  rmse: number;
  mae: number;
  /** Mean absolute percentage error over non-zero observations; null if none */
  mape: number | null;
}

/** Flatten nested arrays depth-first into a flat list of scalars */
export function flattenValues(values: NestedValues): (number | null)[] {
  const flat: (number | null)[] = [];
  collect(values, flat);
  return flat;
}

function collect(value: NestedValues, into: (number | null)[]): void {
  if (value === null || typeof value === "number") {
    into.push(value);
    return;
  }
  for (const item of value) collect(item, into);
}

function isMissing(value: number | null | undefined): value is null | undefined {
  return value === null || value === undefined || Number.isNaN(value);
}

/**
 * RMSE, MAE and MAPE over two equally sized collections.
 *
 * Pairs with a null or NaN on either side are skipped entirely. MAPE only
 * counts pairs whose observed value is non-zero.
 */
export function computeMetrics(yTrue: NestedValues, yPred: NestedValues): ErrorMetrics {
  const truth = flattenValues(yTrue);
  const pred = flattenValues(yPred);

  if (truth.length !== pred.length) {
    throw new OdflowError(
      "LengthMismatch",
      `length mismatch between yTrue (${truth.length}) and yPred (${pred.length})`,
    );
  }

  let squaredError = 0;
  let absoluteError = 0;
  let percentageError = 0;
  let n = 0;
  let nPercentage = 0;

  truth.forEach((yt, i) => {
    const yp = pred[i];
    if (isMissing(yt) || isMissing(yp)) return;

    const diff = yp - yt;
    squaredError += diff * diff;
    absoluteError += Math.abs(diff);
    n++;

    if (yt !== 0) {
      percentageError += Math.abs(diff / yt);
      nPercentage++;
    }
  });

  if (n === 0) {
    throw new OdflowError("NoValidPairs", "no valid numeric pairs");
  }

  return {
    rmse: Math.sqrt(squaredError / n),
    mae: absoluteError / n,
    mape: nPercentage > 0 ? percentageError / nPercentage : null,
  };
}
