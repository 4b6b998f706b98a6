import { promises as fs } from "fs";
import { fetchActivations, FetchActivationsOptions } from "../utils/activations";
import { getCallsign } from "../utils/config";
import { renderHtmlMap } from "../utils/renderHtmlMap";
import { renderStaticMap } from "../utils/renderStaticMap";
import { TileCache, TileCacheOptions } from "../utils/tileCache";

export interface GenerateMapsOptions {
  callsign?: string;
  htmlFile?: string;
  pngFile?: string;
  tileCache?: TileCacheOptions;
  api?: FetchActivationsOptions;
}

/**
 * Fetch the activations once, render the HTML and PNG maps, then write both.
 * Any failure aborts the run before either file is written.
 */
export async function generateMaps(options: GenerateMapsOptions = {}) {
  const callsign = options.callsign ?? getCallsign();
  const htmlFile = options.htmlFile ?? "sota.html";
  const pngFile = options.pngFile ?? "sota.png";

  const activations = await fetchActivations(callsign, options.api);
  console.log(`📍 ${activations.length} activations for ${callsign.toUpperCase()}`);

  const html = await renderHtmlMap(activations);
  const png = await renderStaticMap(activations, { tileCache: new TileCache(options.tileCache) });

  await fs.writeFile(htmlFile, html, "utf8");
  console.log(`✅ Saved ${htmlFile}`);
  await fs.writeFile(pngFile, png);
  console.log(`✅ Saved ${pngFile}`);

  return { callsign, activations: activations.length, htmlFile, pngFile };
}
