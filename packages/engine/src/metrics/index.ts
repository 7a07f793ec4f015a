export { growthRate } from "./growth.js";
export {
  computeMetrics,
  flattenValues,
  type ErrorMetrics,
  type NestedValues,
} from "./error-metrics.js";
