import { Coordinate, haversineMiles } from '../geo/distance';
import type { Place } from '../types/search';

/**
 * The only authority on "inside the search area": keeps a place iff its
 * great-circle distance to the center is at most `radiusMiles`. Distances are
 * recomputed and written back.
 */
export function filterByRadius(places: readonly Place[], center: Coordinate, radiusMiles: number): Place[] {
  const kept: Place[] = [];
  for (const place of places) {
    const distanceMiles = haversineMiles(center, { lat: place.lat, lng: place.lng });
    if (distanceMiles <= radiusMiles) {
      kept.push({ ...place, distanceMiles });
    }
  }
  return kept;
}
