import { Coordinate, destinationPoint, milesToMetres } from './distance';

export interface Tile {
  id: string;
  index: number;
  center: Coordinate;
  radiusMiles: number;
}

export const DEFAULT_TILE_OVERLAP = 0.15;

const SQRT3 = Math.sqrt(3);

/**
 * Cover the circle (center, radiusMiles) with query tiles no larger than
 * maxTileRadiusMiles.
 *
 * Tiles sit on a triangular (hex) lattice with side
 * `maxTileRadiusMiles * sqrt(3) * (1 - overlap)`. Every point of the plane is
 * within `side / sqrt(3)` of a lattice point, so keeping every lattice point
 * within `radiusMiles + side / sqrt(3)` of the center covers the whole circle
 * with a margin of `overlap * maxTileRadiusMiles`. Lattice offsets are mapped
 * onto the sphere by bearing and distance from the center.
 *
 * Order is stable: rows north to south, columns west to east.
 */
export function generateTiles(
  center: Coordinate,
  radiusMiles: number,
  maxTileRadiusMiles: number,
  overlap = DEFAULT_TILE_OVERLAP,
): Tile[] {
  if (!(radiusMiles > 0) || !Number.isFinite(radiusMiles)) {
    throw new RangeError(`radiusMiles must be a positive number, got ${radiusMiles}`);
  }
  if (!(maxTileRadiusMiles > 0) || !Number.isFinite(maxTileRadiusMiles)) {
    throw new RangeError(`maxTileRadiusMiles must be a positive number, got ${maxTileRadiusMiles}`);
  }
  if (!(overlap >= 0 && overlap < 1)) {
    throw new RangeError(`overlap must be in [0, 1), got ${overlap}`);
  }

  if (radiusMiles <= maxTileRadiusMiles) {
    return [{ id: 'tile-0', index: 0, center, radiusMiles }];
  }

  const side = maxTileRadiusMiles * SQRT3 * (1 - overlap);
  const rowHeight = (side * SQRT3) / 2;
  const reach = radiusMiles + side / SQRT3;
  const rows = Math.ceil(reach / rowHeight);
  const cols = Math.ceil(reach / side) + 1;

  const tiles: Tile[] = [];
  for (let row = rows; row >= -rows; row--) {
    const offset = Math.abs(row) % 2 === 1 ? side / 2 : 0;
    for (let col = -cols; col <= cols; col++) {
      const east = col * side + offset;
      const north = row * rowHeight;
      const distance = Math.hypot(east, north);
      if (distance > reach) continue;

      const tileCenter =
        distance === 0
          ? center
          : destinationPoint(center, (Math.atan2(east, north) * 180) / Math.PI, milesToMetres(distance));

      const index = tiles.length;
      tiles.push({ id: `tile-${index}`, index, center: tileCenter, radiusMiles: maxTileRadiusMiles });
    }
  }

  return tiles;
}
