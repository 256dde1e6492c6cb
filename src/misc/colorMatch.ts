import type { Palette, RgbColor } from "@/types/SpriteTypes";

const distSq = (a: RgbColor, b: RgbColor) => {
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return dr * dr + dg * dg + db * db;
};

/**
 * Nearest palette index by squared RGB distance. Ties go to the lowest
 * index; an exact match stops the scan.
 */
export function bestIndex(color: RgbColor, palette: Palette): number {
  let best = 0;
  let bestD = Number.POSITIVE_INFINITY;
  const n = Math.min(palette.length, 256);
  for (let i = 0; i < n; i++) {
    const d = distSq(color, palette[i]);
    if (d < bestD) {
      bestD = d;
      best = i;
      if (d === 0) break;
    }
  }
  return best;
}
