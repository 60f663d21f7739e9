export interface Coordinate {
  lat: number;
  lng: number;
}

export const EARTH_RADIUS_METRES = 6_371_000;
export const METRES_PER_MILE = 1609.344;

const toRad = (deg: number): number => (deg * Math.PI) / 180;
const toDeg = (rad: number): number => (rad * 180) / Math.PI;

export function milesToMetres(miles: number): number {
  return miles * METRES_PER_MILE;
}

export function metresToMiles(metres: number): number {
  return metres / METRES_PER_MILE;
}

/** Great-circle distance in metres. */
export function haversineMetres(a: Coordinate, b: Coordinate): number {
  const dLat = toRad(b.lat - a.lat);
  const dLng = toRad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS_METRES * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export function haversineMiles(a: Coordinate, b: Coordinate): number {
  return metresToMiles(haversineMetres(a, b));
}

/**
 * Point reached by travelling `distanceMetres` from `origin` along the initial
 * bearing (degrees clockwise from north).
 */
export function destinationPoint(origin: Coordinate, bearingDeg: number, distanceMetres: number): Coordinate {
  const delta = distanceMetres / EARTH_RADIUS_METRES;
  const theta = toRad(bearingDeg);
  const phi1 = toRad(origin.lat);
  const lambda1 = toRad(origin.lng);

  const sinPhi2 = Math.sin(phi1) * Math.cos(delta) + Math.cos(phi1) * Math.sin(delta) * Math.cos(theta);
  const phi2 = Math.asin(Math.min(1, Math.max(-1, sinPhi2)));
  const lambda2 =
    lambda1 +
    Math.atan2(
      Math.sin(theta) * Math.sin(delta) * Math.cos(phi1),
      Math.cos(delta) - Math.sin(phi1) * sinPhi2,
    );

  return { lat: toDeg(phi2), lng: normalizeLongitude(toDeg(lambda2)) };
}

export function normalizeLongitude(lng: number): number {
  const wrapped = ((((lng + 180) % 360) + 360) % 360) - 180;
  // keep +180 rather than folding it to -180
  return wrapped === -180 && lng > 0 ? 180 : wrapped;
}

export function isValidCoordinate(value: { lat?: unknown; lng?: unknown } | null | undefined): value is Coordinate {
  if (!value) return false;
  const { lat, lng } = value;
  return (
    typeof lat === 'number' &&
    typeof lng === 'number' &&
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    Math.abs(lat) <= 90 &&
    Math.abs(lng) <= 180
  );
}
