export {
  tryParseIsoTimestamp,
  parseIsoTimestamp,
  validateTimeRange,
  type TimeRange,
} from "./iso.js";
export { buildTimeAxis, timestampComparator, type TimeAxis } from "./time-axis.js";
