import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Activation } from "../activations";
import { EmptyDataError } from "../errors";
import { escapeHtml, mapCenter, outputToHtml, popupText, renderHtmlMap } from "../renderHtmlMap";

const activations: Activation[] = [
  { summitCode: "HB/VS-001", summitName: "Test & Peak", lat: 46, lon: 7, date: "2024-05-01" },
  { summitCode: "HB/VS-002", summitName: "<b>Other</b>", lat: 46.5, lon: 7.5, date: "2023-08-14" },
];

describe("renderHtmlMap", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("builds the popup text from code, name and date", () => {
    expect(popupText(activations[0])).toBe("HB/VS-001 Test & Peak (2024-05-01)");
  });

  it("escapes HTML special characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });

  it("centres the map on the mean coordinate", () => {
    expect(mapCenter(activations)).toEqual([46.25, 7.25]);
  });

  it("renders one counter-named marker per activation", async () => {
    const html = await renderHtmlMap(activations);

    expect(html).toContain('var map_0 = L.map("map_0", {');
    expect(html).toContain("center: [46.25,7.25],");
    expect(html).toContain("zoom: 8,");
    expect(html).toContain("L.control.scale().addTo(map_0);");
    expect(html).toContain("    var marker_1 = L.marker([46,7]).addTo(map_0);");
    expect(html).toContain('    marker_1.bindPopup("HB/VS-001 Test &amp; Peak (2024-05-01)");');
    expect(html).toContain("    var marker_2 = L.marker([46.5,7.5]).addTo(map_0);");
    expect(html).toContain('    marker_2.bindPopup("HB/VS-002 &lt;b&gt;Other&lt;/b&gt; (2023-08-14)");');
    expect(html).not.toContain("marker_3");
    expect(html).not.toContain("{{");
  });

  it("renders identical HTML for identical input", async () => {
    expect(await renderHtmlMap(activations)).toBe(await renderHtmlMap(activations));
  });

  it("rejects an empty activation list", async () => {
    await expect(renderHtmlMap([])).rejects.toBeInstanceOf(EmptyDataError);
  });

  it("writes the page to the output file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "html-map-"));
    const file = path.join(dir, "sota.html");

    const html = await outputToHtml(activations, file, { title: "N0CALL" });

    expect(await fs.readFile(file, "utf8")).toBe(html);
    expect(html).toContain("<title>N0CALL</title>");
    await fs.rm(dir, { recursive: true, force: true });
  });
});
