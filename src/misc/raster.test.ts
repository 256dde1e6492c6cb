import { describe, it, expect } from "vitest";
import {
  drawCircle,
  drawLine,
  drawRect,
  fillCircle,
  fillRect,
  floodFill,
  getPixel,
  pasteQuantized,
  pasteQuantizedCentered,
  setPixel,
  stampDisc,
  stampLine,
} from "./raster";
import { createBlankSprite, defaultGrayscalePalette } from "./Helpers";
import { decodeSprite, encodeSprite } from "@/services/ShpCodec";
import type { RgbaImage, Sprite } from "@/types/SpriteTypes";

// one string per row, one digit per pixel (indices < 10 in these tests)
const rows = (s: Sprite, fi = 0) =>
  Array.from({ length: s.height }, (_, y) => Array.from(s.frames[fi].pixels.subarray(y * s.width, (y + 1) * s.width)).join(""));

function rgba(width: number, height: number, px: number[][]): RgbaImage {
  return { width, height, data: Uint8ClampedArray.from(px.flat()) };
}

describe("setPixel / getPixel", () => {
  it("ignores out-of-range writes", () => {
    const s = createBlankSprite(4, 3, 1);
    const before = s.frames[0].pixels.slice();
    setPixel(s, 0, -1, 0, 7);
    setPixel(s, 0, 4, 0, 7);
    setPixel(s, 0, 0, -1, 7);
    setPixel(s, 0, 0, 3, 7);
    setPixel(s, 1, 0, 0, 7);
    expect(s.frames[0].pixels).toEqual(before);
  });

  it("reads 0 outside the canvas", () => {
    const s = createBlankSprite(2, 2, 1);
    s.frames[0].pixels.fill(5);
    expect(getPixel(s, 0, 1, 1)).toBe(5);
    expect(getPixel(s, 0, 2, 0)).toBe(0);
    expect(getPixel(s, 0, -1, 0)).toBe(0);
    expect(getPixel(s, 3, 0, 0)).toBe(0);
  });

  it("only touches the addressed frame", () => {
    const s = createBlankSprite(2, 2, 2);
    setPixel(s, 1, 1, 0, 4);
    expect(rows(s, 0)).toEqual(["00", "00"]);
    expect(rows(s, 1)).toEqual(["04", "00"]);
  });
});

describe("drawLine", () => {
  it("includes both endpoints", () => {
    const s = createBlankSprite(5, 3, 1);
    drawLine(s, 0, 0, 0, 4, 2, 1);
    expect(rows(s)).toEqual(["10000", "01100", "00011"]);
  });

  it("draws the same pixels for a reversed horizontal line", () => {
    const a = createBlankSprite(5, 2, 1);
    const b = createBlankSprite(5, 2, 1);
    drawLine(a, 0, 0, 1, 4, 1, 3);
    drawLine(b, 0, 4, 1, 0, 1, 3);
    expect(rows(a)).toEqual(["00000", "33333"]);
    expect(rows(b)).toEqual(rows(a));
  });

  it("writes a single pixel for a degenerate line", () => {
    const s = createBlankSprite(3, 3, 1);
    drawLine(s, 0, 1, 1, 1, 1, 9);
    expect(rows(s)).toEqual(["000", "090", "000"]);
  });

  it("clips lines that leave the canvas", () => {
    const s = createBlankSprite(3, 3, 1);
    drawLine(s, 0, -2, 1, 5, 1, 2);
    expect(rows(s)).toEqual(["000", "222", "000"]);
  });

  it("truncates fractional endpoints and skips non-finite ones", () => {
    const s = createBlankSprite(4, 2, 1);
    drawLine(s, 0, 0.5, 0, 2.9, 0, 4);
    drawLine(s, 0, 0, 1, Number.NaN, 1, 4);
    drawLine(s, 0, 0, 1, Infinity, 1, 4);
    expect(rows(s)).toEqual(["4440", "0000"]);
  });
});

describe("rectangles", () => {
  it("normalizes corners before drawing the border", () => {
    const s = createBlankSprite(5, 5, 1);
    drawRect(s, 0, 3, 3, 1, 1, 1);
    expect(rows(s)).toEqual(["00000", "01110", "01010", "01110", "00000"]);
  });

  it("fills the inclusive bounds", () => {
    const s = createBlankSprite(5, 4, 1);
    fillRect(s, 0, 3, 1, 1, 2, 6);
    expect(rows(s)).toEqual(["00000", "06660", "06660", "00000"]);
  });
});

describe("circles", () => {
  it("draws a symmetric midpoint outline", () => {
    const s = createBlankSprite(5, 5, 1);
    drawCircle(s, 0, 2, 2, 2, 1);
    expect(rows(s)).toEqual(["01110", "10001", "10001", "10001", "01110"]);
  });

  it("draws a radius-1 outline without the centre", () => {
    const s = createBlankSprite(5, 5, 1);
    drawCircle(s, 0, 2, 2, 1, 1);
    expect(rows(s)).toEqual(["00000", "00100", "01010", "00100", "00000"]);
  });

  it("does nothing for a non-positive radius", () => {
    const s = createBlankSprite(3, 3, 1);
    drawCircle(s, 0, 1, 1, 0, 1);
    fillCircle(s, 0, 1, 1, -2, 1);
    expect(rows(s)).toEqual(["000", "000", "000"]);
  });

  it("fills scanline spans", () => {
    const s = createBlankSprite(5, 5, 1);
    fillCircle(s, 0, 2, 2, 2, 4);
    expect(rows(s)).toEqual(["00400", "04440", "44444", "04440", "00400"]);
  });

  it("clips a filled circle at the canvas corner", () => {
    const s = createBlankSprite(3, 3, 1);
    fillCircle(s, 0, 0, 0, 2, 4);
    expect(rows(s)).toEqual(["444", "440", "400"]);
  });
});

describe("stampDisc", () => {
  it("stamps one pixel for diameter 1 or less", () => {
    const s = createBlankSprite(3, 3, 1);
    stampDisc(s, 0, 1, 1, 1, 5);
    stampDisc(s, 0, 0, 0, 0, 6);
    expect(rows(s)).toEqual(["600", "050", "000"]);
  });

  it("uses radius max(1, (d - 1) / 2)", () => {
    const two = createBlankSprite(3, 3, 1);
    const three = createBlankSprite(3, 3, 1);
    const five = createBlankSprite(5, 5, 1);
    stampDisc(two, 0, 1, 1, 2, 1);
    stampDisc(three, 0, 1, 1, 3, 1);
    stampDisc(five, 0, 2, 2, 5, 1);
    expect(rows(two)).toEqual(["010", "111", "010"]);
    expect(rows(three)).toEqual(rows(two));
    expect(rows(five)).toEqual(["00100", "01110", "11111", "01110", "00100"]);
  });
});

describe("stampLine", () => {
  it("stamps along the segment", () => {
    const s = createBlankSprite(6, 3, 1);
    stampLine(s, 0, 1, 1, 4, 1, 3, 2);
    expect(rows(s)).toEqual(["022220", "222222", "022220"]);
  });

  it("matches drawLine for a one-pixel brush", () => {
    const a = createBlankSprite(5, 3, 1);
    const b = createBlankSprite(5, 3, 1);
    stampLine(a, 0, 0, 0, 4, 2, 1, 1);
    drawLine(b, 0, 0, 0, 4, 2, 1);
    expect(rows(a)).toEqual(rows(b));
  });

  it("truncates fractional endpoints", () => {
    const s = createBlankSprite(4, 1, 1);
    stampLine(s, 0, 3.6, 0, 1.2, 0, 1, 5);
    expect(rows(s)).toEqual(["0555"]);
  });
});

describe("floodFill", () => {
  it("fills the 4-connected region behind a wall", () => {
    const s = createBlankSprite(5, 3, 1);
    drawLine(s, 0, 2, 0, 2, 2, 1);
    floodFill(s, 0, 0, 0, 3);
    expect(rows(s)).toEqual(["33100", "33100", "33100"]);
  });

  it("does not leak through diagonal gaps", () => {
    const s = createBlankSprite(3, 3, 1);
    s.frames[0].pixels.set([0, 1, 0, 1, 0, 1, 0, 1, 0]);
    floodFill(s, 0, 0, 0, 2);
    expect(rows(s)).toEqual(["210", "101", "010"]);
  });

  it("changes nothing on a second fill with the same colour", () => {
    const s = createBlankSprite(4, 4, 1);
    drawRect(s, 0, 0, 0, 3, 3, 1);
    floodFill(s, 0, 1, 1, 7);
    const once = s.frames[0].pixels.slice();
    floodFill(s, 0, 1, 1, 7);
    expect(s.frames[0].pixels).toEqual(once);
    expect(rows(s)).toEqual(["1111", "1771", "1771", "1111"]);
  });

  it("ignores seeds outside the canvas", () => {
    const s = createBlankSprite(2, 2, 1);
    floodFill(s, 0, 5, 5, 1);
    floodFill(s, 0, -1, 0, 1);
    expect(rows(s)).toEqual(["00", "00"]);
  });

  it("fills a large canvas without recursion", () => {
    const s = createBlankSprite(400, 300, 1);
    floodFill(s, 0, 200, 150, 9);
    expect(s.frames[0].pixels.every(v => v === 9)).toBe(true);
  });
});

describe("pasteQuantized", () => {
  const pal = defaultGrayscalePalette();

  it("quantizes opaque pixels and skips ones below the alpha threshold", () => {
    const s = createBlankSprite(5, 5, 1);
    s.frames[0].pixels.fill(9);
    const img = rgba(2, 2, [
      [1, 1, 1, 255], [2, 2, 2, 7],
      [5, 5, 5, 8], [8, 8, 8, 255],
    ]);
    pasteQuantized(s, 0, img, 3, 3, pal);
    expect(rows(s)).toEqual(["99999", "99999", "99999", "99919", "99958"]);
  });

  it("drops pixels that land outside the canvas", () => {
    const s = createBlankSprite(3, 3, 1);
    const img = rgba(2, 2, [
      [1, 1, 1, 255], [2, 2, 2, 255],
      [3, 3, 3, 255], [4, 4, 4, 255],
    ]);
    pasteQuantized(s, 0, img, -1, 2, pal);
    expect(rows(s)).toEqual(["000", "000", "200"]);
  });

  it("centres the image on the canvas", () => {
    const s = createBlankSprite(5, 5, 1);
    const img = rgba(2, 2, [
      [1, 1, 1, 255], [2, 2, 2, 255],
      [3, 3, 3, 255], [4, 4, 4, 255],
    ]);
    pasteQuantizedCentered(s, 0, img, pal);
    expect(rows(s)).toEqual(["00000", "01200", "03400", "00000", "00000"]);
  });

  it("centres an image wider than the canvas", () => {
    const s = createBlankSprite(5, 5, 1);
    const img = rgba(7, 1, [1, 2, 3, 4, 5, 6, 7].map(v => [v, v, v, 255]));
    pasteQuantizedCentered(s, 0, img, pal);
    expect(rows(s)[2]).toBe("23456");
  });
});

describe("codec round-trip after drawing", () => {
  it("preserves every frame", () => {
    const s = createBlankSprite(6, 6, 3);
    drawCircle(s, 0, 3, 3, 2, 7);
    fillRect(s, 2, 0, 0, 5, 1, 4);
    floodFill(s, 2, 0, 5, 2);
    const enc = encodeSprite(s);
    if (!enc.ok) throw new Error(enc.error.message);
    const dec = decodeSprite(enc.value);
    if (!dec.ok) throw new Error(dec.error.message);
    expect(dec.value.frames.map(f => Array.from(f.pixels))).toEqual(s.frames.map(f => Array.from(f.pixels)));
  });
});
