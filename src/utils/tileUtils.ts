import { lat2tile, lon2tile } from "./geoBounds";

export interface TileIndex {
  z: number;
  x: number;
  y: number;
}

export interface TileRange {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// keeps an east/south edge that lies exactly on a tile boundary out of the next tile
const EDGE_EPSILON = 1e-11;
const MAX_MERCATOR_LAT = 85.0511287798066;

function clampLat(lat: number): number {
  return Math.min(Math.max(lat, -MAX_MERCATOR_LAT), MAX_MERCATOR_LAT);
}

export function tileKey({ z, x, y }: TileIndex): string {
  return `${z}/${x}/${y}`;
}

/**
 * Every tile at `zoom` whose footprint intersects the box, ordered by (y, x).
 * The result is always a contiguous rectangle of the tile grid.
 */
export function tilesForBBox(
  minLon: number,
  minLat: number,
  maxLon: number,
  maxLat: number,
  zoom: number
): TileIndex[] {
  const xMin = lon2tile(minLon, zoom);
  const xMax = lon2tile(maxLon - EDGE_EPSILON, zoom);
  const yMin = lat2tile(clampLat(maxLat), zoom); // lat max → y min
  const yMax = lat2tile(clampLat(minLat + EDGE_EPSILON), zoom); // lat min → y max

  const tiles: TileIndex[] = [];
  for (let y = yMin; y <= yMax; y++) {
    for (let x = xMin; x <= xMax; x++) {
      tiles.push({ z: zoom, x, y });
    }
  }
  return tiles;
}

export function tileRange(tiles: TileIndex[]): TileRange {
  const xs = tiles.map((t) => t.x);
  const ys = tiles.map((t) => t.y);

  return {
    minX: Math.min(...xs),
    minY: Math.min(...ys),
    maxX: Math.max(...xs),
    maxY: Math.max(...ys),
  };
}

/** Row-major (y, x) order: stable fetch order for the compositor. */
export function sortTiles(tiles: TileIndex[]): TileIndex[] {
  return [...tiles].sort((a, b) => a.y - b.y || a.x - b.x);
}
