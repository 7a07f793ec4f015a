import type { OdQueryParams } from "./types.js";

/** Encode tensor query params; id lists travel comma-separated */
export function toTensorQuery(params: OdQueryParams): Record<string, unknown> {
  const { geoIds, ...rest } = params;
  return geoIds === undefined ? rest : { ...rest, geoIds: geoIds.join(",") };
}
