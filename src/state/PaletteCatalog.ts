import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { parsePaletteBytes } from "@/misc/Helpers";
import { silentLogger, type Logger } from "@/misc/log";
import type { Palette } from "@/types/SpriteTypes";

export type PaletteEntry = { name: string; palette: Palette };

/** Group name ("" for the root, otherwise the relative folder path) → palettes in that folder. */
export type PaletteCatalog = Map<string, PaletteEntry[]>;

export type PaletteSource = { path: string; bytes: Uint8Array };

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Build a catalog from in-memory resources, e.g. palettes bundled with an app. */
export function catalogFromEntries(sources: PaletteSource[], log: Logger = silentLogger): PaletteCatalog {
  const groups = new Map<string, PaletteEntry[]>();
  for (const src of sources) {
    const rel = src.path.split(path.sep).join("/");
    if (!rel.toLowerCase().endsWith(".pal")) continue;

    const parsed = parsePaletteBytes(src.bytes);
    if (!parsed.ok) {
      log.warn(`skipping ${rel}: ${parsed.error.message}`);
      continue;
    }
    const folder = path.posix.dirname(rel);
    const group = folder === "." ? "" : folder;
    const name = path.posix.basename(rel).slice(0, -".pal".length);
    const list = groups.get(group) ?? [];
    list.push({ name, palette: parsed.value });
    groups.set(group, list);
  }

  const sorted: PaletteCatalog = new Map();
  for (const key of [...groups.keys()].sort(byName)) {
    const list = groups.get(key) ?? [];
    sorted.set(key, list.sort((a, b) => byName(a.name, b.name)));
  }
  return sorted;
}

async function walk(root: string, dir: string, out: string[]) {
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) await walk(root, full, out);
    else if (entry.isFile()) out.push(path.relative(root, full));
  }
}

/** Scan a directory tree for .pal files. */
export async function loadPaletteCatalog(rootDir: string, log: Logger = silentLogger): Promise<PaletteCatalog> {
  const files: string[] = [];
  await walk(rootDir, rootDir, files);
  const sources: PaletteSource[] = [];
  for (const rel of files) {
    if (!rel.toLowerCase().endsWith(".pal")) continue;
    sources.push({ path: rel, bytes: new Uint8Array(await readFile(path.join(rootDir, rel))) });
  }
  const catalog = catalogFromEntries(sources, log);
  log.info(`loaded ${sources.length} palette file(s) in ${catalog.size} group(s) from ${rootDir}`);
  return catalog;
}

export function firstPalette(catalog: PaletteCatalog): PaletteEntry | undefined {
  for (const list of catalog.values()) {
    if (list.length) return list[0];
  }
  return undefined;
}

export function findPalette(catalog: PaletteCatalog, group: string, name: string): PaletteEntry | undefined {
  return catalog.get(group)?.find(e => e.name === name);
}
