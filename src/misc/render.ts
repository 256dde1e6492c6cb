import { BRIGHTNESS_MAX, BRIGHTNESS_MIN, MAX_RENDER_PIXELS } from "@/app/constants";
import { clamp, fail, ok } from "./Helpers";
import type { CodecResult, Frame, Palette, Sprite } from "@/types/SpriteTypes";

export type RgbaBuffer = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

/** Returned instead of allocating when a sprite is too large to render. */
export const placeholderRgba = (): RgbaBuffer => ({
  width: 1,
  height: 1,
  data: Uint8ClampedArray.from([0, 0, 0, 255]),
});

function toRgba(frame: Frame, width: number, height: number, palette: Palette, brightness: number): RgbaBuffer {
  const total = width * height;
  const data = new Uint8ClampedArray(total * 4);
  for (let i = 0; i < total; i++) {
    const idx = frame.pixels[i];
    const c = palette[idx] ?? { r: 0, g: 0, b: 0 };
    const o = i * 4;
    data[o + 0] = Math.min(255, Math.round(c.r * brightness));
    data[o + 1] = Math.min(255, Math.round(c.g * brightness));
    data[o + 2] = Math.min(255, Math.round(c.b * brightness));
    data[o + 3] = idx === 0 ? 0 : 255;
  }
  return { width, height, data };
}

/**
 * Preview pixels for one frame. Index 0 is transparent; brightness is
 * clamped to [0.2, 3]. A frame index past the end shows frame 0.
 */
export function renderFrameRgba(sprite: Sprite, palette: Palette, frameIndex: number, brightness = 1): RgbaBuffer {
  const { width, height, frames } = sprite;
  const pixels = width * height;
  if (pixels === 0 || pixels > MAX_RENDER_PIXELS || frames.length === 0) return placeholderRgba();
  const frame = frames[frameIndex] ?? frames[0];
  return toRgba(frame, width, height, palette, clamp(brightness, BRIGHTNESS_MIN, BRIGHTNESS_MAX));
}

/** Unscaled export image for one frame. */
export function exportFrameRgba(sprite: Sprite, palette: Palette, frameIndex: number): CodecResult<RgbaBuffer> {
  const frame = sprite.frames[frameIndex];
  if (!frame) return fail("InvalidDimensions", `Frame ${frameIndex} out of range (0..${sprite.frames.length - 1})`);
  const pixels = sprite.width * sprite.height;
  if (pixels > MAX_RENDER_PIXELS) return fail("InvalidDimensions", `${pixels} pixels exceeds the ${MAX_RENDER_PIXELS} limit`);
  return ok(toRgba(frame, sprite.width, sprite.height, palette, 1));
}
