import { destinationPoint, haversineMiles, milesToMetres } from '../geo/distance';
import { filterByRadius } from './radiusFilter';
import { place } from '../test/fixtures';

describe('filterByRadius', () => {
  const center = { lat: 33.0198, lng: -96.6989 };

  function placeAt(id: string, bearing: number, miles: number) {
    const point = destinationPoint(center, bearing, milesToMetres(miles));
    return place(id, { lat: point.lat, lng: point.lng, distanceMiles: 999 });
  }

  it('keeps places inside the radius and drops the rest', () => {
    const kept = filterByRadius([placeAt('in', 10, 2), placeAt('out', 200, 7), placeAt('edge', 90, 4.9)], center, 5);
    expect(kept.map((p) => p.placeId)).toEqual(['in', 'edge']);
  });

  it('recomputes distances from the center', () => {
    const [kept] = filterByRadius([placeAt('in', 45, 3)], center, 5);
    expect(kept.distanceMiles).toBeCloseTo(3, 6);
  });

  it('includes a place exactly on the boundary', () => {
    const edge = placeAt('edge', 300, 3);
    const boundary = haversineMiles(center, { lat: edge.lat, lng: edge.lng });
    expect(filterByRadius([edge], center, boundary)).toHaveLength(1);
  });

  it('never returns a place beyond the radius', () => {
    const places = Array.from({ length: 36 }, (_, i) => placeAt(`p${i}`, i * 10, (i % 12) + 0.5));
    for (const kept of filterByRadius(places, center, 6)) {
      expect(haversineMiles(center, { lat: kept.lat, lng: kept.lng })).toBeLessThanOrEqual(6);
    }
  });
});
