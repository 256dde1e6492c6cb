import { MAX_U16, PALETTE_BYTES, PALETTE_SIZE } from "@/app/constants";
import type { CodecErrorKind, CodecResult, Frame, Palette, Sprite } from "@/types/SpriteTypes";

export const ok = <T>(value: T): CodecResult<T> => ({ ok: true, value });

export const fail = <T>(kind: CodecErrorKind, message: string): CodecResult<T> => ({
  ok: false,
  error: { kind, message },
});

export const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

export function makeBlankFrame(width: number, height: number): Frame {
  return { pixels: new Uint8Array(width * height) };
}

export function createBlankSprite(width: number, height: number, frameCount: number): Sprite {
  for (const [label, v] of [["width", width], ["height", height], ["frame count", frameCount]] as const) {
    if (!Number.isInteger(v) || v < 1 || v > MAX_U16) {
      throw new RangeError(`Sprite ${label} must be an integer in 1..${MAX_U16}, got ${v}`);
    }
  }
  return {
    width,
    height,
    frames: Array.from({ length: frameCount }, () => makeBlankFrame(width, height)),
  };
}

export const cloneFrame = (f: Frame): Frame => ({ pixels: f.pixels.slice() });

export const isFrameEmpty = (f: Frame) => f.pixels.every(v => v === 0);

/** Fallback palette: index i maps to (i, i, i). */
export function defaultGrayscalePalette(): Palette {
  return Array.from({ length: PALETTE_SIZE }, (_, i) => ({ r: i, g: i, b: i }));
}

/** Parse a raw .pal file: 256 RGB triples, no header. Trailing bytes are ignored. */
export function parsePaletteBytes(bytes: Uint8Array): CodecResult<Palette> {
  if (bytes.length < PALETTE_BYTES) {
    return fail("Truncated", `Palette needs ${PALETTE_BYTES} bytes, got ${bytes.length}`);
  }
  const palette: Palette = [];
  for (let i = 0; i < PALETTE_SIZE; i++) {
    palette.push({ r: bytes[i * 3], g: bytes[i * 3 + 1], b: bytes[i * 3 + 2] });
  }
  return ok(palette);
}

export function paletteToBytes(palette: Palette): Uint8Array {
  const out = new Uint8Array(PALETTE_BYTES);
  for (let i = 0; i < PALETTE_SIZE; i++) {
    const c = palette[i] ?? { r: 0, g: 0, b: 0 };
    out[i * 3 + 0] = c.r & 0xff;
    out[i * 3 + 1] = c.g & 0xff;
    out[i * 3 + 2] = c.b & 0xff;
  }
  return out;
}

export function toHexColor({ r, g, b }: { r: number; g: number; b: number }) {
  const h = ((r & 0xff) << 16) | ((g & 0xff) << 8) | (b & 0xff);
  return `#${h.toString(16).padStart(6, "0")}`.toUpperCase();
}
