export {
  buildOdTensor,
  buildPairSeries,
  defaultCellValue,
  resolveCellWrite,
  type TensorBuildOptions,
} from "./tensor-builder.js";
export { parseFillValue, buildRelationsMatrix } from "./relations-matrix.js";
