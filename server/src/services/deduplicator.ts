import type { Place, PlaceCandidate } from '../types/search';

/**
 * Collapse candidates that share a provider id. The first sighting wins and
 * later ones are dropped without merging; output keeps first-seen order.
 * Passing places back through is a no-op.
 */
export function dedupe(candidates: readonly PlaceCandidate[]): Place[] {
  const seen = new Set<string>();
  const places: Place[] = [];

  for (const candidate of candidates) {
    if (seen.has(candidate.placeId)) continue;
    seen.add(candidate.placeId);
    places.push(toPlace(candidate));
  }

  return places;
}

function toPlace(candidate: PlaceCandidate): Place {
  return {
    category: candidate.types[0] ?? null,
    components: null,
    providerRating: null,
    providerRatingCount: null,
    // a Place passed back in keeps its own enrichment
    ...candidate,
  };
}
