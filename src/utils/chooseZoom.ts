import { MAP_MAX_ZOOM, MAP_MIN_ZOOM, MAP_TARGET_HEIGHT, MAP_TARGET_WIDTH } from "./config";
import { Point, projectLonLat } from "./geoBounds";

export interface ZoomOptions {
  minZoom?: number;
  maxZoom?: number;
  targetWidth?: number;
  targetHeight?: number;
}

/**
 * Most detailed zoom at which the pixel bounding box of all points still fits
 * the target canvas. Spreads too wide for every candidate get minZoom.
 */
export function chooseZoom(points: Point[], options: ZoomOptions = {}): number {
  const {
    minZoom = MAP_MIN_ZOOM,
    maxZoom = MAP_MAX_ZOOM,
    targetWidth = MAP_TARGET_WIDTH,
    targetHeight = MAP_TARGET_HEIGHT,
  } = options;

  for (let zoom = maxZoom; zoom >= minZoom; zoom--) {
    const pixels = points.map((p) => projectLonLat(p.lon, p.lat, zoom));
    const xs = pixels.map((p) => p.x);
    const ys = pixels.map((p) => p.y);

    const width = Math.max(...xs) - Math.min(...xs);
    const height = Math.max(...ys) - Math.min(...ys);

    if (width <= targetWidth && height <= targetHeight) return zoom;
  }

  return minZoom;
}
