import { ConfigError } from "./errors";

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// activation source
export const SOTA_API_URL = process.env.SOTA_API_URL ?? "https://sotl.as/api";
export const API_TIMEOUT_MS = intFromEnv("API_TIMEOUT_MS", 30_000);

// tile server (OSM usage policy requires an identifying User-Agent)
export const TILE_URL_TEMPLATE =
  process.env.TILE_URL_TEMPLATE ?? "https://tile.openstreetmap.org/{z}/{x}/{y}.png";
export const TILE_USER_AGENT = process.env.TILE_USER_AGENT ?? "SOTA-map-generator/1.0 (ham radio)";
export const TILE_TIMEOUT_MS = intFromEnv("TILE_TIMEOUT_MS", 20_000);
export const TILE_CACHE_DIR = process.env.TILE_CACHE_DIR ?? "tile_cache";

// static map sizing
export const MAP_MIN_ZOOM = intFromEnv("MAP_MIN_ZOOM", 4);
export const MAP_MAX_ZOOM = intFromEnv("MAP_MAX_ZOOM", 12);
export const MAP_TARGET_WIDTH = intFromEnv("MAP_TARGET_WIDTH", 1200);
export const MAP_TARGET_HEIGHT = intFromEnv("MAP_TARGET_HEIGHT", 800);

/**
 * Operator callsign: CALLSIGN wins, otherwise the owner of the GitHub
 * repository the workflow runs in.
 */
export function getCallsign(env: NodeJS.ProcessEnv = process.env): string {
  const callsign = env.CALLSIGN || env.GITHUB_REPOSITORY_OWNER;
  if (!callsign) {
    throw new ConfigError("CALLSIGN or GITHUB_REPOSITORY_OWNER environment variable not set");
  }
  return callsign;
}
