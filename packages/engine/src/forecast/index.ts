export {
  forecastTensor,
  naiveForecast,
  movingAverageForecast,
  DEFAULT_MOVING_AVERAGE_WINDOW,
  type ForecastMethod,
  type ForecastHistory,
  type ForecastOptions,
  type ForecastResult,
} from "./forecast.js";
export {
  createNoiseTransform,
  mulberry32,
  DEFAULT_NOISE_RATIO,
  type NoiseOptions,
} from "./noise.js";
