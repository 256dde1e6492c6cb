import { describe, it, expect } from "vitest";
import { bestIndex } from "./colorMatch";
import { defaultGrayscalePalette } from "./Helpers";
import type { Palette } from "@/types/SpriteTypes";

describe("bestIndex", () => {
  it("finds the exact grey on a grayscale palette", () => {
    const pal = defaultGrayscalePalette();
    expect(bestIndex({ r: 128, g: 128, b: 128 }, pal)).toBe(128);
    expect(bestIndex({ r: 128, g: 128, b: 128 }, pal)).toBe(128);
  });

  it("picks the nearest entry for a colour not in the palette", () => {
    const pal = defaultGrayscalePalette();
    // (10,20,30): distance to (i,i,i) is minimised at the mean, 20
    expect(bestIndex({ r: 10, g: 20, b: 30 }, pal)).toBe(20);
  });

  it("resolves ties to the lowest index", () => {
    const pal: Palette = defaultGrayscalePalette();
    pal[3] = { r: 200, g: 0, b: 0 };
    pal[7] = { r: 200, g: 0, b: 0 };
    pal[5] = { r: 201, g: 1, b: 1 };
    // (200,0,0) exact at 3, stops there
    expect(bestIndex({ r: 200, g: 0, b: 0 }, pal)).toBe(3);
    // (202,0,0): index 3 and 7 are at distance 4, index 5 at 1+1+1 = 3
    expect(bestIndex({ r: 202, g: 0, b: 0 }, pal)).toBe(5);
  });

  it("keeps the first of two equally distant entries", () => {
    const pal: Palette = Array.from({ length: 256 }, () => ({ r: 255, g: 255, b: 255 }));
    pal[10] = { r: 0, g: 0, b: 10 };
    pal[11] = { r: 0, g: 0, b: 0 };
    // target (0,0,5): both at distance 25
    expect(bestIndex({ r: 0, g: 0, b: 5 }, pal)).toBe(10);
  });
});
