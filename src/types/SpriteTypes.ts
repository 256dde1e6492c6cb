export type RgbColor = { r: number; g: number; b: number };

/** 256 entries, index 0 is the background colour. */
export type Palette = RgbColor[];

export type Frame = {
  pixels: Uint8Array; // row-major palette indices, width*height bytes
};

export type Sprite = {
  width: number;
  height: number;
  frames: Frame[];
};

/** Per-frame header as found on disk; only lives for the duration of a decode. */
export type FrameHeader = {
  x: number;
  y: number;
  w: number;
  h: number;
  flags: number;
  dataOffset: number;
};

export type FrameEncoding = "rle0" | "scanline" | "raw";

/** Straight (non-premultiplied) RGBA pixels, 4 bytes per pixel. */
export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
};

export type CodecErrorKind =
  | "NotASprite"
  | "InvalidDimensions"
  | "Truncated"
  | "OffsetOutOfRange"
  | "EmptySprite";

export type SpriteCodecError = {
  kind: CodecErrorKind;
  message: string;
};

export type CodecResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: SpriteCodecError };

export type Tool = "pencil" | "eraser" | "line" | "rectangle" | "circle" | "fill";

export type Point = { x: number; y: number };
