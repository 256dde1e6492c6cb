import { DEFAULT_ALPHA_THRESHOLD } from "@/app/constants";
import { bestIndex } from "./colorMatch";
import type { Palette, RgbaImage, Sprite } from "@/types/SpriteTypes";

// Every op here silently ignores coordinates (and frame indices) outside the sprite.

const inside = (s: Sprite, x: number, y: number) => x >= 0 && y >= 0 && x < s.width && y < s.height;

// Line walkers step by whole pixels, so endpoints are snapped to cells first.
const cells = (...v: number[]) => (v.every(Number.isFinite) ? v.map(Math.trunc) : undefined);

export function setPixel(s: Sprite, fi: number, x: number, y: number, color: number) {
  const frame = s.frames[fi];
  if (!frame || !inside(s, x, y)) return;
  frame.pixels[y * s.width + x] = color;
}

export function getPixel(s: Sprite, fi: number, x: number, y: number): number {
  const frame = s.frames[fi];
  if (!frame || !inside(s, x, y)) return 0;
  return frame.pixels[y * s.width + x];
}

/** Bresenham; both endpoints are drawn. */
export function drawLine(s: Sprite, fi: number, ax: number, ay: number, bx: number, by: number, color: number) {
  const pts = cells(ax, ay, bx, by);
  if (!pts) return;
  const [x0, y0, x1, y1] = pts;
  const dx = Math.abs(x1 - x0);
  const sx = x0 < x1 ? 1 : -1;
  const dy = -Math.abs(y1 - y0);
  const sy = y0 < y1 ? 1 : -1;
  let err = dx + dy;
  let x = x0, y = y0;
  for (;;) {
    setPixel(s, fi, x, y, color);
    if (x === x1 && y === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) { err += dy; x += sx; }
    if (e2 <= dx) { err += dx; y += sy; }
  }
}

const normalize = (a: number, b: number): [number, number] => (a <= b ? [a, b] : [b, a]);

export function drawRect(s: Sprite, fi: number, x0: number, y0: number, x1: number, y1: number, color: number) {
  const [lx, rx] = normalize(x0, x1);
  const [ty, by] = normalize(y0, y1);
  drawLine(s, fi, lx, ty, rx, ty, color);
  drawLine(s, fi, lx, by, rx, by, color);
  drawLine(s, fi, lx, ty, lx, by, color);
  drawLine(s, fi, rx, ty, rx, by, color);
}

export function fillRect(s: Sprite, fi: number, x0: number, y0: number, x1: number, y1: number, color: number) {
  const [lx, rx] = normalize(x0, x1);
  const [ty, by] = normalize(y0, y1);
  for (let y = ty; y <= by; y++) {
    for (let x = lx; x <= rx; x++) setPixel(s, fi, x, y, color);
  }
}

/** Midpoint circle outline. */
export function drawCircle(s: Sprite, fi: number, cx: number, cy: number, radius: number, color: number) {
  if (radius <= 0) return;
  let x = radius, y = 0, err = 1 - x;
  while (x >= y) {
    const pts: [number, number][] = [
      [cx + x, cy + y], [cx + y, cy + x], [cx - y, cy + x], [cx - x, cy + y],
      [cx - x, cy - y], [cx - y, cy - x], [cx + y, cy - x], [cx + x, cy - y],
    ];
    for (const [px, py] of pts) setPixel(s, fi, px, py, color);
    y++;
    if (err < 0) {
      err += 2 * y + 1;
    } else {
      x--;
      err += 2 * (y - x) + 1;
    }
  }
}

export function fillCircle(s: Sprite, fi: number, cx: number, cy: number, radius: number, color: number) {
  if (radius <= 0) return;
  const r2 = radius * radius;
  for (let y = cy - radius; y <= cy + radius; y++) {
    const dy = y - cy;
    const span = r2 - dy * dy;
    if (span < 0) continue;
    const dx = Math.trunc(Math.sqrt(span));
    for (let x = cx - dx; x <= cx + dx; x++) setPixel(s, fi, x, y, color);
  }
}

/** Brush/eraser tip: a single pixel for size <= 1, otherwise a filled disc. */
export function stampDisc(s: Sprite, fi: number, cx: number, cy: number, diameter: number, color: number) {
  if (diameter <= 1) {
    setPixel(s, fi, cx, cy, color);
    return;
  }
  const radius = Math.max(1, Math.trunc((diameter - 1) / 2));
  fillCircle(s, fi, cx, cy, radius, color);
}

/** Drag segment for the brush: stamps a disc at every Bresenham point. */
export function stampLine(
  s: Sprite,
  fi: number,
  ax: number,
  ay: number,
  bx: number,
  by: number,
  diameter: number,
  color: number
) {
  const pts = cells(ax, ay, bx, by);
  if (!pts) return;
  const [x0, y0, x1, y1] = pts;
  const dx = Math.abs(x1 - x0);
  const sx = x0 < x1 ? 1 : -1;
  const dy = -Math.abs(y1 - y0);
  const sy = y0 < y1 ? 1 : -1;
  let err = dx + dy;
  let x = x0, y = y0;
  for (;;) {
    stampDisc(s, fi, x, y, diameter, color);
    if (x === x1 && y === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) { err += dy; x += sx; }
    if (e2 <= dx) { err += dx; y += sy; }
  }
}

/** 4-connected fill with an explicit stack. */
export function floodFill(s: Sprite, fi: number, px: number, py: number, newColor: number) {
  const x = Math.trunc(px);
  const y = Math.trunc(py);
  const frame = s.frames[fi];
  if (!frame || !inside(s, x, y)) return;
  const target = getPixel(s, fi, x, y);
  if (target === newColor) return;

  const { width, height } = s;
  const pixels = frame.pixels;
  const stack: [number, number][] = [[x, y]];
  while (stack.length) {
    const top = stack.pop();
    if (!top) break;
    const [cx, cy] = top;
    if (cx < 0 || cy < 0 || cx >= width || cy >= height) continue;
    const i = cy * width + cx;
    if (pixels[i] !== target) continue;
    pixels[i] = newColor;
    stack.push([cx - 1, cy], [cx + 1, cy], [cx, cy - 1], [cx, cy + 1]);
  }
}

/**
 * Quantize an RGBA image onto the frame at (destX, destY). Pixels with
 * alpha below the threshold leave the destination as it was.
 */
export function pasteQuantized(
  s: Sprite,
  fi: number,
  image: RgbaImage,
  destX: number,
  destY: number,
  palette: Palette,
  alphaThreshold = DEFAULT_ALPHA_THRESHOLD
) {
  if (!s.frames[fi]) return;
  const { width: iw, height: ih, data } = image;
  for (let y = 0; y < ih; y++) {
    for (let x = 0; x < iw; x++) {
      const o = (y * iw + x) * 4;
      if (data[o + 3] < alphaThreshold) continue;
      const tx = x + destX, ty = y + destY;
      if (!inside(s, tx, ty)) continue;
      setPixel(s, fi, tx, ty, bestIndex({ r: data[o], g: data[o + 1], b: data[o + 2] }, palette));
    }
  }
}

/** Paste centred on the canvas. */
export function pasteQuantizedCentered(
  s: Sprite,
  fi: number,
  image: RgbaImage,
  palette: Palette,
  alphaThreshold = DEFAULT_ALPHA_THRESHOLD
) {
  const offX = Math.trunc((s.width - image.width) / 2);
  const offY = Math.trunc((s.height - image.height) / 2);
  pasteQuantized(s, fi, image, offX, offY, palette, alphaThreshold);
}
