#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { generateMaps } from "./scripts/generateMaps";
import { TILE_CACHE_DIR } from "./utils/config";

const program = new Command();

program
  .name("sota-map")
  .description("Render SOTA activations as an interactive HTML map and a static PNG map")
  .version("1.0.0")
  .option("-c, --callsign <callsign>", "operator callsign (default: $CALLSIGN or $GITHUB_REPOSITORY_OWNER)")
  .option("--html <file>", "HTML map output", "sota.html")
  .option("--png <file>", "PNG map output", "sota.png")
  .option("--cache-dir <dir>", "tile cache directory", TILE_CACHE_DIR)
  .action(async (opts: { callsign?: string; html: string; png: string; cacheDir: string }) => {
    await generateMaps({
      callsign: opts.callsign,
      htmlFile: opts.html,
      pngFile: opts.png,
      tileCache: { cacheDir: opts.cacheDir },
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("❌", err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exitCode = 1;
});
