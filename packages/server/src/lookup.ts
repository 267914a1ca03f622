import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_DATA_DIR = path.resolve(__dirname, "..", "data");

const mapsFileSchema = z.record(
  z.object({
    name: z.string(),
    image: z.string().url(),
  }),
);

const modesFileSchema = z.record(z.string());

export type MapEntries = z.infer<typeof mapsFileSchema>;
export type ModeEntries = z.infer<typeof modesFileSchema>;

/**
 * Static map and mode lookups, built once at startup.
 *
 * Every lookup is total: an unknown map falls back to its raw key for both
 * the display name and the image URL, and an unknown mode has no
 * abbreviation.
 */
export interface LookupTables {
  mapName(mapKey: string): string;
  mapImage(mapKey: string): string;
  modeAbbreviation(modeKey: string): string;
}

export function createLookupTables(maps: MapEntries, modes: ModeEntries): LookupTables {
  const names: ReadonlyMap<string, string> = new Map(
    Object.entries(maps).map(([key, entry]) => [key, entry.name]),
  );
  const images: ReadonlyMap<string, string> = new Map(
    Object.entries(maps).map(([key, entry]) => [key, entry.image]),
  );
  const abbreviations: ReadonlyMap<string, string> = new Map(Object.entries(modes));

  return Object.freeze({
    mapName: (mapKey: string) => names.get(mapKey) ?? mapKey,
    mapImage: (mapKey: string) => images.get(mapKey) ?? mapKey,
    modeAbbreviation: (modeKey: string) => abbreviations.get(modeKey) ?? "",
  });
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf8"));
}

/** Load `maps.json` and `modes.json` from the data directory. */
export function loadLookupTables(dataDir: string = DEFAULT_DATA_DIR): LookupTables {
  const maps = mapsFileSchema.parse(readJson(path.join(dataDir, "maps.json")));
  const modes = modesFileSchema.parse(readJson(path.join(dataDir, "modes.json")));
  return createLookupTables(maps, modes);
}
