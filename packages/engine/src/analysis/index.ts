/**
 * Flow analysis module.
 *
 * FlowRecords + place lookup -> ranked group flows and top-K corridors.
 */

export { minRanks, withMinRanks } from "./ranking.js";
export {
  buildPlaceLookup,
  knownProvinceOf,
  provinceKeyOf,
  cityKeyOf,
  type PlaceLookup,
} from "./place-lookup.js";
export {
  aggregateFlows,
  groupKeyOf,
  type FlowAggregationOptions,
} from "./flow-aggregator.js";
export {
  provinceCorridors,
  cityCorridors,
  DEFAULT_PROVINCE_TOPK,
  DEFAULT_INTRA_TOPK,
  DEFAULT_INTER_TOPK,
  type CityCorridorOptions,
} from "./corridors.js";
