/**
 * id -> place lookup used to derive group keys.
 *
 * Built fresh from the place directory for each request.
 */

import { UNKNOWN_GROUP, type Place } from "@odflow/types";

export type PlaceLookup = ReadonlyMap<number, Place>;

export function buildPlaceLookup(places: Iterable<Place>): PlaceLookup {
  const lookup = new Map<number, Place>();
  for (const place of places) lookup.set(place.id, place);
  return lookup;
}

/** Province of a place, or null when the place or its province is unknown */
export function knownProvinceOf(lookup: PlaceLookup, id: number): string | null {
  const province = lookup.get(id)?.province;
  return province ? province : null;
}

export function provinceKeyOf(lookup: PlaceLookup, id: number): string {
  return knownProvinceOf(lookup, id) ?? UNKNOWN_GROUP;
}

export function cityKeyOf(lookup: PlaceLookup, id: number): string {
  const name = lookup.get(id)?.name;
  return name ? name : UNKNOWN_GROUP;
}
