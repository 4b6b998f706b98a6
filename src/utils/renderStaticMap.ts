import { promises as fs } from "fs";
import sharp from "sharp";
import { Activation, toPoints } from "./activations";
import { chooseZoom, ZoomOptions } from "./chooseZoom";
import { EmptyDataError } from "./errors";
import { paddedBounds, Point, projectLonLat, TILE_SIZE } from "./geoBounds";
import { TileCache } from "./tileCache";
import { sortTiles, TileIndex, tileRange, tilesForBBox } from "./tileUtils";

export type GetTile = (z: number, x: number, y: number) => Promise<Buffer>;

export interface MarkerStyle {
  radius: number;
  fill: string;
  outline: string;
}

export const DEFAULT_MARKER: MarkerStyle = { radius: 4, fill: "red", outline: "black" };

const BACKGROUND = { r: 0, g: 0, b: 0 };

/** Canvas-local pixel position of a point, truncated to whole pixels. */
export function markerPosition(point: Point, zoom: number, tiles: TileIndex[]) {
  const { minX, minY } = tileRange(tiles);
  const { x, y } = projectLonLat(point.lon, point.lat, zoom);

  return {
    x: Math.trunc(x - minX * TILE_SIZE),
    y: Math.trunc(y - minY * TILE_SIZE),
  };
}

function markersSvg(
  positions: { x: number; y: number }[],
  width: number,
  height: number,
  style: MarkerStyle
): Buffer {
  const circles = positions
    .map(
      ({ x, y }) =>
        `<circle cx="${x + 0.5}" cy="${y + 0.5}" r="${style.radius}" fill="${style.fill}" stroke="${style.outline}" stroke-width="1"/>`
    )
    .join("");

  return Buffer.from(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${circles}</svg>`
  );
}

/**
 * Stitch the tiles into one RGB canvas, draw a marker per point and encode
 * as PNG. sharp writes no metadata chunks unless asked to, so the same
 * input always produces the same bytes.
 */
export async function renderPng(
  points: Point[],
  zoom: number,
  tiles: TileIndex[],
  getTile: GetTile,
  marker: MarkerStyle = DEFAULT_MARKER
): Promise<Buffer> {
  const { minX, minY, maxX, maxY } = tileRange(tiles);
  const width = (maxX - minX + 1) * TILE_SIZE;
  const height = (maxY - minY + 1) * TILE_SIZE;

  const layers: sharp.OverlayOptions[] = [];

  // sequential on purpose: one request at a time against the tile server
  for (const t of sortTiles(tiles)) {
    const input = await getTile(t.z, t.x, t.y);
    layers.push({ input, left: (t.x - minX) * TILE_SIZE, top: (t.y - minY) * TILE_SIZE });
  }

  const positions = points.map((p) => markerPosition(p, zoom, tiles));
  layers.push({ input: markersSvg(positions, width, height, marker), left: 0, top: 0 });

  const { data, info } = await sharp({
    create: { width, height, channels: 3, background: BACKGROUND },
  })
    .composite(layers)
    .raw()
    .toBuffer({ resolveWithObject: true });

  return sharp(data, { raw: { width: info.width, height: info.height, channels: info.channels } })
    .removeAlpha()
    .png({ compressionLevel: 9 })
    .toBuffer();
}

export interface StaticMapOptions {
  tileCache?: TileCache;
  zoom?: ZoomOptions;
  marker?: MarkerStyle;
}

/** Activations → finished PNG bytes; nothing is written to disk except tile cache entries. */
export async function renderStaticMap(
  activations: Activation[],
  options: StaticMapOptions = {}
): Promise<Buffer> {
  if (activations.length === 0) {
    throw new EmptyDataError("No activation coordinates found");
  }

  const points = toPoints(activations).sort((a, b) => a.lat - b.lat || a.lon - b.lon);
  const { minLon, minLat, maxLon, maxLat } = paddedBounds(points);

  const zoom = chooseZoom(points, options.zoom);
  console.log(`🔍 Using zoom level ${zoom}`);

  const tiles = tilesForBBox(minLon, minLat, maxLon, maxLat, zoom);
  console.log(`🧱 Stitching ${tiles.length} tiles`);

  const tileCache = options.tileCache ?? new TileCache();
  return renderPng(points, zoom, tiles, (z, x, y) => tileCache.getTile(z, x, y), options.marker);
}

export async function outputToPng(
  activations: Activation[],
  outputFilename: string,
  options: StaticMapOptions = {}
): Promise<Buffer> {
  const png = await renderStaticMap(activations, options);

  await fs.writeFile(outputFilename, png);
  console.log(`✅ Saved ${outputFilename}`);

  return png;
}
