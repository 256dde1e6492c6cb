import {
  FLAG_RLE0,
  FLAG_SCANLINE,
  FLAG_TRANSPARENT,
  FRAME_HEADER_BYTES,
  MAX_U16,
  SPRITE_HEADER_BYTES,
} from "@/app/constants";
import { fail, isFrameEmpty, ok } from "@/misc/Helpers";
import type { CodecResult, Frame, FrameEncoding, FrameHeader, Sprite } from "@/types/SpriteTypes";
import { ByteReader, ShortReadError } from "./ByteReader";
import { ByteWriter } from "./ByteWriter";

/*
 * Layout (all little-endian):
 *   u16 zero, u16 width, u16 height, u16 frameCount
 *   frameCount x 24-byte headers:
 *     u16 x, u16 y, u16 w, u16 h, u32 flags, 4 reserved, 4 reserved, u32 dataOffset
 *   frame data, addressed by dataOffset
 */

export function frameEncoding(flags: number): FrameEncoding {
  if ((flags & FLAG_RLE0) === FLAG_RLE0) return "rle0";
  if ((flags & FLAG_SCANLINE) !== 0 && (flags & FLAG_TRANSPARENT) === 0) return "scanline";
  return "raw";
}

function readFrameHeader(r: ByteReader): FrameHeader {
  const x = r.u16();
  const y = r.u16();
  const w = r.u16();
  const h = r.u16();
  const flags = r.u32();
  r.skip(4); // frame colour, unused
  r.skip(4);
  const dataOffset = r.u32();
  return { x, y, w, h, flags, dataOffset };
}

/** Writes that land outside the canvas are dropped. */
function putPixel(out: Uint8Array, width: number, height: number, x: number, y: number, v: number) {
  if (x < width && y < height) out[y * width + x] = v;
}

function decodeFrame(bytes: Uint8Array, fh: FrameHeader, width: number, height: number): Frame {
  const pixels = new Uint8Array(width * height);
  if (fh.dataOffset === 0 || fh.w === 0 || fh.h === 0) return { pixels };

  const r = new ByteReader(bytes, fh.dataOffset);
  const encoding = frameEncoding(fh.flags);

  for (let row = 0; row < fh.h; row++) {
    const y = fh.y + row;
    let x = fh.x;

    if (encoding === "raw") {
      for (const v of r.take(fh.w)) putPixel(pixels, width, height, x++, y, v);
      continue;
    }

    // row length includes its own two bytes
    let remaining = Math.max(0, r.u16() - 2);
    while (remaining > 0) {
      const v = r.u8();
      remaining--;
      if (encoding === "rle0" && v === 0) {
        // zero run: canvas is already background, just move the cursor.
        // A zero as the row's last byte has no count and ends the row.
        if (remaining === 0) break;
        x += r.u8();
        remaining--;
      } else {
        putPixel(pixels, width, height, x++, y, v);
      }
    }
  }
  return { pixels };
}

export function decodeSprite(bytes: Uint8Array): CodecResult<Sprite> {
  if (bytes.length < SPRITE_HEADER_BYTES) {
    return fail("InvalidDimensions", `Header needs ${SPRITE_HEADER_BYTES} bytes, got ${bytes.length}`);
  }
  const r = new ByteReader(bytes);
  if (r.u16() !== 0) return fail("NotASprite", "Missing zero marker at offset 0");

  const width = r.u16();
  const height = r.u16();
  const frameCount = r.u16();
  if (width === 0 || height === 0 || frameCount === 0) {
    return fail("InvalidDimensions", `Invalid size ${width}x${height} with ${frameCount} frame(s)`);
  }

  try {
    const headers: FrameHeader[] = [];
    for (let i = 0; i < frameCount; i++) headers.push(readFrameHeader(r));

    const frames: Frame[] = [];
    for (const [i, fh] of headers.entries()) {
      if (fh.dataOffset !== 0 && fh.w !== 0 && fh.h !== 0 && fh.dataOffset >= bytes.length) {
        return fail("OffsetOutOfRange", `Frame ${i} data offset ${fh.dataOffset} is past end of ${bytes.length} byte buffer`);
      }
      frames.push(decodeFrame(bytes, fh, width, height));
    }
    return ok({ width, height, frames });
  } catch (e) {
    if (e instanceof ShortReadError) return fail("Truncated", e.message);
    throw e;
  }
}

/**
 * Always writes uncompressed full-canvas frames. All-background frames get
 * offset 0 and no data block.
 */
export function encodeSprite(sprite: Sprite): CodecResult<Uint8Array> {
  const { width, height, frames } = sprite;
  if (frames.length === 0) return fail("EmptySprite", "Sprite has no frames");
  if (width < 1 || height < 1 || width > MAX_U16 || height > MAX_U16 || frames.length > MAX_U16) {
    return fail("InvalidDimensions", `Cannot store ${width}x${height} with ${frames.length} frame(s)`);
  }

  const size = width * height;
  const headerSize = SPRITE_HEADER_BYTES + FRAME_HEADER_BYTES * frames.length;
  let cursor = headerSize;
  const offsets = frames.map(f => {
    if (isFrameEmpty(f)) return 0;
    const at = cursor;
    cursor += size;
    return at;
  });

  const w = new ByteWriter(cursor);
  w.u16(0).u16(width).u16(height).u16(frames.length);
  for (const off of offsets) {
    w.u16(0).u16(0).u16(width).u16(height)
      .u32(0)   // flags: raw, opaque
      .zeros(4) // frame colour
      .zeros(4)
      .u32(off);
  }
  frames.forEach((f, i) => {
    if (offsets[i] !== 0) w.bytes(f.pixels);
  });
  return ok(w.toBytes());
}
