/**
 * Great-circle ranking for the product radius search.
 *
 * A full scan over the candidates: callers narrow the set first
 * (available products, optional name match).
 */

export const EARTH_RADIUS_KM = 6371.0;

export interface Coordinate {
  lat: number;
  lng: number;
}

export interface Locatable {
  shopLat: number | null;
  shopLng: number | null;
}

export interface RankedItem<T> {
  item: T;
  distanceKm: number;
}

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/** Haversine distance in kilometres. */
export function haversineKm(from: Coordinate, to: Coordinate): number {
  const lat1 = toRadians(from.lat);
  const lng1 = toRadians(from.lng);
  const lat2 = toRadians(to.lat);
  const lng2 = toRadians(to.lng);
  const dLat = lat2 - lat1;
  const dLng = lng2 - lng1;

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;
  // rounding can push a past 1 for antipodal points; asin is undefined there
  const c = 2 * Math.asin(Math.min(1, Math.sqrt(a)));

  return EARTH_RADIUS_KM * c;
}

/**
 * Candidates within `radiusKm` of `origin`, nearest first. Candidates without
 * shop coordinates are skipped; equal distances keep their input order.
 */
export function rankByDistance<T extends Locatable>(
  candidates: readonly T[],
  origin: Coordinate,
  radiusKm: number,
): RankedItem<T>[] {
  const ranked: RankedItem<T>[] = [];

  for (const item of candidates) {
    if (item.shopLat === null || item.shopLng === null) continue;

    const distanceKm = haversineKm(origin, { lat: item.shopLat, lng: item.shopLng });
    if (distanceKm <= radiusKm) {
      ranked.push({ item, distanceKm });
    }
  }

  // Array.prototype.sort is stable
  return ranked.sort((a, b) => a.distanceKm - b.distanceKm);
}

/** Distance as reported to clients. */
export function roundDistance(distanceKm: number): number {
  return Math.round(distanceKm * 1000) / 1000;
}
