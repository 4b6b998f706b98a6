import { promises as fs } from "fs";
import path from "path";
import { Activation } from "./activations";
import { EmptyDataError } from "./errors";

const TEMPLATE_PATH = path.resolve(__dirname, "../templates/activationMap.html");

export interface HtmlMapOptions {
  title?: string;
  zoomStart?: number;
  tileUrl?: string;
  attribution?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** JSON literal that is safe to inline in a <script> block. */
function scriptLiteral(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

export function popupText(a: Activation): string {
  return `${a.summitCode} ${a.summitName} (${a.date})`;
}

export function mapCenter(activations: Activation[]): [number, number] {
  const lat = activations.reduce((sum, a) => sum + a.lat, 0) / activations.length;
  const lon = activations.reduce((sum, a) => sum + a.lon, 0) / activations.length;
  return [lat, lon];
}

/**
 * Leaflet page with one marker per activation. Element ids come from a
 * counter (map_0, marker_1, ...) so the same input renders the same HTML.
 */
export async function renderHtmlMap(
  activations: Activation[],
  options: HtmlMapOptions = {}
): Promise<string> {
  if (activations.length === 0) {
    throw new EmptyDataError("No activations to place on the map");
  }

  const {
    title = "SOTA activations",
    zoomStart = 8,
    tileUrl = "https://tile.openstreetmap.org/{z}/{x}/{y}.png",
    attribution = '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors',
  } = options;

  let nextId = 0;
  const mapId = `map_${nextId++}`;

  const markers = activations
    .map((a) => {
      const markerId = `marker_${nextId++}`;
      return (
        `    var ${markerId} = L.marker(${scriptLiteral([a.lat, a.lon])}).addTo(${mapId});\n` +
        `    ${markerId}.bindPopup(${scriptLiteral(escapeHtml(popupText(a)))});`
      );
    })
    .join("\n");

  const template = await fs.readFile(TEMPLATE_PATH, "utf8");
  const variables: Record<string, string> = {
    title: escapeHtml(title),
    mapId,
    center: scriptLiteral(mapCenter(activations)),
    zoom: String(zoomStart),
    tileUrl: scriptLiteral(tileUrl),
    attribution: scriptLiteral(attribution),
    markers,
  };

  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => variables[key] ?? match);
}

export async function outputToHtml(
  activations: Activation[],
  outputFilename: string,
  options?: HtmlMapOptions
): Promise<string> {
  const html = await renderHtmlMap(activations, options);
  await fs.writeFile(outputFilename, html, "utf8");
  console.log(`✅ Saved ${outputFilename}`);
  return html;
}
