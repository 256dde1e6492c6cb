import { afterEach, describe, it, expect } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { catalogFromEntries, findPalette, firstPalette, loadPaletteCatalog } from "./PaletteCatalog";
import { defaultGrayscalePalette, paletteToBytes } from "@/misc/Helpers";
import type { Palette } from "@/types/SpriteTypes";

const solid = (v: number): Palette => Array.from({ length: 256 }, () => ({ r: v, g: v, b: v }));

describe("catalogFromEntries", () => {
  it("groups by folder and sorts groups and names", () => {
    const catalog = catalogFromEntries([
      { path: "Units/unit.pal", bytes: paletteToBytes(solid(2)) },
      { path: "iso.PAL", bytes: paletteToBytes(solid(1)) },
      { path: "Units/anim.pal", bytes: paletteToBytes(solid(3)) },
      { path: "readme.txt", bytes: new Uint8Array(768) },
    ]);
    expect([...catalog.keys()]).toEqual(["", "Units"]);
    expect(catalog.get("")?.map(e => e.name)).toEqual(["iso"]);
    expect(catalog.get("Units")?.map(e => e.name)).toEqual(["anim", "unit"]);
    expect(findPalette(catalog, "Units", "unit")?.palette[0]).toEqual({ r: 2, g: 2, b: 2 });
  });

  it("skips files too short to be a palette", () => {
    const catalog = catalogFromEntries([
      { path: "a/bad.pal", bytes: new Uint8Array(100) },
      { path: "a/good.pal", bytes: paletteToBytes(defaultGrayscalePalette()) },
    ]);
    expect(catalog.get("a")?.map(e => e.name)).toEqual(["good"]);
  });

  it("returns the first palette of the first non-empty group", () => {
    const catalog = catalogFromEntries([
      { path: "b/z.pal", bytes: paletteToBytes(solid(9)) },
      { path: "b/y.pal", bytes: paletteToBytes(solid(8)) },
    ]);
    expect(firstPalette(catalog)?.name).toBe("y");
    expect(firstPalette(new Map())).toBeUndefined();
  });
});

describe("loadPaletteCatalog", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("reads .pal files from nested folders", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pal-catalog-"));
    await mkdir(path.join(dir, "Theater", "Snow"), { recursive: true });
    await writeFile(path.join(dir, "base.pal"), paletteToBytes(solid(4)));
    await writeFile(path.join(dir, "Theater", "Snow", "snow.pal"), paletteToBytes(solid(5)));
    await writeFile(path.join(dir, "Theater", "notes.md"), "not a palette");

    const catalog = await loadPaletteCatalog(dir);
    expect([...catalog.keys()]).toEqual(["", "Theater/Snow"]);
    expect(findPalette(catalog, "Theater/Snow", "snow")?.palette[255]).toEqual({ r: 5, g: 5, b: 5 });
    expect(findPalette(catalog, "", "base")?.palette[0]).toEqual({ r: 4, g: 4, b: 4 });
  });
});
