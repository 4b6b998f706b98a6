import { promises as fs } from "fs";
import path from "path";
import sharp from "sharp";
import { TILE_CACHE_DIR, TILE_TIMEOUT_MS, TILE_URL_TEMPLATE, TILE_USER_AGENT } from "./config";
import { FetchError } from "./errors";
import { TILE_SIZE } from "./geoBounds";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TileCacheOptions {
  cacheDir?: string;
  urlTemplate?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export function tileUrl(template: string, z: number, x: number, y: number): string {
  return template
    .replace("{z}", String(z))
    .replace("{x}", String(x))
    .replace("{y}", String(y));
}

/**
 * Raster tiles on disk under <cacheDir>/<z>/<x>/<y>.png, fetched from the
 * tile server on a miss. Tiles are immutable, so entries are never evicted.
 */
export class TileCache {
  private readonly cacheDir: string;
  private readonly urlTemplate: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: TileCacheOptions = {}) {
    this.cacheDir = options.cacheDir ?? TILE_CACHE_DIR;
    this.urlTemplate = options.urlTemplate ?? TILE_URL_TEMPLATE;
    this.userAgent = options.userAgent ?? TILE_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? TILE_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  tilePath(z: number, x: number, y: number): string {
    return path.join(this.cacheDir, String(z), String(x), `${y}.png`);
  }

  /** RGB PNG bytes of tile z/x/y. */
  async getTile(z: number, x: number, y: number): Promise<Buffer> {
    const file = this.tilePath(z, x, y);

    const cached = await readIfExists(file);
    if (cached) return decodeTile(cached, file);

    const url = tileUrl(this.urlTemplate, z, x, y);
    const body = await this.download(url);
    const png = await decodeTile(body, url);

    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, png);
    console.log(`🗺️ Fetched tile z${z} x${x} y${y}`);

    return png;
  }

  private async download(url: string): Promise<Buffer> {
    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        headers: { "User-Agent": this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new FetchError(`Tile request failed: ${url}`, url, undefined, err);
    }

    if (!resp.ok) {
      throw new FetchError(`Tile server error: ${resp.status} - ${url}`, url, resp.status);
    }

    try {
      return Buffer.from(await resp.arrayBuffer());
    } catch (err) {
      throw new FetchError(`Tile body could not be read: ${url}`, url, resp.status, err);
    }
  }
}

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/** Decode any raster into the 256x256 RGB PNG the compositor expects. */
async function decodeTile(body: Buffer, source: string): Promise<Buffer> {
  try {
    const { data, info } = await sharp(body)
      .removeAlpha()
      .toColourspace("srgb")
      .png({ compressionLevel: 9 })
      .toBuffer({ resolveWithObject: true });
    if (info.width !== TILE_SIZE || info.height !== TILE_SIZE) {
      throw new Error(`unexpected tile size ${info.width}x${info.height}`);
    }
    return data;
  } catch (err) {
    throw new FetchError(`Tile is not a valid ${TILE_SIZE}x${TILE_SIZE} image: ${source}`, source, undefined, err);
  }
}
