export const TILE_SIZE = 256;

/** Degrees added on every side of the activation bounds before tiles are located. */
export const BOUNDS_PADDING = 0.1;

export interface Point {
  lat: number;
  lon: number;
}

export interface PixelPoint {
  x: number;
  y: number;
}

export interface GeoBBox {
  minLon: number;
  minLat: number;
  maxLon: number;
  maxLat: number;
}

/** Web mercator: lon/lat → global pixel coordinates at zoom z */
export function projectLonLat(lon: number, lat: number, zoom: number): PixelPoint {
  // clamp keeps the poles finite
  const siny = Math.min(Math.max(Math.sin((lat * Math.PI) / 180), -0.9999), 0.9999);
  const scale = TILE_SIZE * 2 ** zoom;

  return {
    x: ((lon + 180) / 360) * scale,
    y: (0.5 - Math.log((1 + siny) / (1 - siny)) / (4 * Math.PI)) * scale,
  };
}

function clampTile(value: number, zoom: number): number {
  return Math.min(Math.max(value, 0), 2 ** zoom - 1);
}

/** Web mercator: longitude → tile X at zoom z */
export function lon2tile(lon: number, zoom: number): number {
  return clampTile(Math.floor(((lon + 180) / 360) * 2 ** zoom), zoom);
}

/** Web mercator: latitude → tile Y at zoom z */
export function lat2tile(lat: number, zoom: number): number {
  const latRad = (lat * Math.PI) / 180;
  return clampTile(
    Math.floor(((1 - Math.log(Math.tan(latRad) + 1 / Math.cos(latRad)) / Math.PI) / 2) * 2 ** zoom),
    zoom
  );
}

export function paddedBounds(points: Point[], padding = BOUNDS_PADDING): GeoBBox {
  const lats = points.map((p) => p.lat);
  const lons = points.map((p) => p.lon);

  return {
    minLon: Math.min(...lons) - padding,
    minLat: Math.min(...lats) - padding,
    maxLon: Math.max(...lons) + padding,
    maxLat: Math.max(...lats) + padding,
  };
}
