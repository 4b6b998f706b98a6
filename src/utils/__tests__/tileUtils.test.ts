import { projectLonLat, TILE_SIZE } from "../geoBounds";
import { sortTiles, tileKey, tileRange, tilesForBBox } from "../tileUtils";

describe("tilesForBBox", () => {
  const tiles = tilesForBBox(6.9, 45.9, 7.6, 46.6, 10);

  it("covers the box with a contiguous rectangle in (y, x) order", () => {
    expect(tiles).toHaveLength(12);
    expect(tiles[0]).toEqual({ z: 10, x: 531, y: 361 });
    expect(tiles[tiles.length - 1]).toEqual({ z: 10, x: 533, y: 364 });
    expect(tileRange(tiles)).toEqual({ minX: 531, minY: 361, maxX: 533, maxY: 364 });

    const keys = new Set(tiles.map(tileKey));
    for (let y = 361; y <= 364; y++) {
      for (let x = 531; x <= 533; x++) {
        expect(keys.has(`10/${x}/${y}`)).toBe(true);
      }
    }
  });

  it("contains every padded corner and point", () => {
    const { minX, minY, maxX, maxY } = tileRange(tiles);
    const probes = [
      [6.9, 45.9],
      [7.6, 46.6],
      [7, 46],
      [7.5, 46.5],
    ];
    for (const [lon, lat] of probes) {
      const { x, y } = projectLonLat(lon, lat, 10);
      expect(x).toBeGreaterThanOrEqual(minX * TILE_SIZE);
      expect(x).toBeLessThan((maxX + 1) * TILE_SIZE);
      expect(y).toBeGreaterThanOrEqual(minY * TILE_SIZE);
      expect(y).toBeLessThan((maxY + 1) * TILE_SIZE);
    }
  });

  it("does not add a tile that the east or south edge only touches", () => {
    expect(tilesForBBox(0, 0, 180, 85, 1)).toEqual([{ z: 1, x: 1, y: 0 }]);
  });

  it("keeps indices inside the grid", () => {
    const world = tilesForBBox(-180, -90, 180, 90, 2);
    expect(world).toHaveLength(16);
    expect(tileRange(world)).toEqual({ minX: 0, minY: 0, maxX: 3, maxY: 3 });
  });
});

describe("sortTiles", () => {
  it("orders by row, then column, without mutating the input", () => {
    const input = [
      { z: 3, x: 2, y: 1 },
      { z: 3, x: 1, y: 1 },
      { z: 3, x: 5, y: 0 },
    ];
    expect(sortTiles(input).map(tileKey)).toEqual(["3/5/0", "3/1/1", "3/2/1"]);
    expect(input[0]).toEqual({ z: 3, x: 2, y: 1 });
  });
});
