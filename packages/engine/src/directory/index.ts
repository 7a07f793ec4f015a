export { buildDenseIndex, buildAscendingIndex } from "./dense-index.js";
export { parseIdFilter } from "./id-filter.js";
export {
  resolvePlaceName,
  MAX_NAME_CANDIDATES,
  type PlaceNameSource,
} from "./name-resolution.js";
