/**
 * Naive forecast mock.
 *
 * Extrapolates an OD tensor by repeating its last slice or the moving
 * average of its last slices. This is a stand-in for a real model and is
 * labelled as simulated wherever it is served.
 */

export type ForecastMethod = "naive" | "moving_average";

/** Historical tensor to extrapolate from */
export interface ForecastHistory {
  N: number;
  ids: number[];
  tensor: (number | null)[][][];
}

export interface ForecastOptions {
  horizon: number;
  method: ForecastMethod;
  /** Moving-average window (default 3) */
  window?: number;
}

export interface ForecastResult {
  T: number;
  N: number;
  ids: number[];
  tensor: (number | null)[][][];
}

export const DEFAULT_MOVING_AVERAGE_WINDOW = 3;

function copySlice(slice: (number | null)[][]): (number | null)[][] {
  return slice.map((row) => [...row]);
}

/** Repeat the last observed slice for every future step */
export function naiveForecast(
  tensor: (number | null)[][][],
  horizon: number,
): (number | null)[][][] {
  const last = tensor[tensor.length - 1];
  if (!last) return [];
  return Array.from({ length: horizon }, () => copySlice(last));
}

/**
 * Average the last min(window, T) slices cell by cell (missing cells count
 * as 0) and repeat the average for every future step.
 */
export function movingAverageForecast(
  tensor: (number | null)[][][],
  N: number,
  horizon: number,
  window: number = DEFAULT_MOVING_AVERAGE_WINDOW,
): number[][][] {
  if (tensor.length === 0) return [];
  const w = Math.max(1, Math.min(window, tensor.length));
  const recent = tensor.slice(-w);

  const average: number[][] = Array.from({ length: N }, (_, i) =>
    Array.from({ length: N }, (_, j) => {
      let sum = 0;
      for (const slice of recent) sum += slice[i]?.[j] ?? 0;
      return sum / w;
    }),
  );

  return Array.from({ length: horizon }, () => average.map((row) => [...row]));
}

export function forecastTensor(
  history: ForecastHistory,
  options: ForecastOptions,
): ForecastResult {
  const { N, ids, tensor } = history;
  const horizon = Math.floor(options.horizon);
  if (tensor.length === 0 || horizon <= 0) {
    return { T: 0, N, ids, tensor: [] };
  }

  const predicted =
    options.method === "naive"
      ? naiveForecast(tensor, horizon)
      : movingAverageForecast(tensor, N, horizon, options.window);

  return { T: horizon, N, ids, tensor: predicted };
}
