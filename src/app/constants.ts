export const PALETTE_SIZE = 256;
export const PALETTE_BYTES = PALETTE_SIZE * 3;

// On-disk sprite layout
export const SPRITE_HEADER_BYTES = 8;
export const FRAME_HEADER_BYTES = 24;
export const MAX_U16 = 0xffff;

// Flag bits in a frame header (lowest two bits pick the row encoding)
export const FLAG_TRANSPARENT = 1;
export const FLAG_SCANLINE = 2;
export const FLAG_RLE0 = FLAG_TRANSPARENT | FLAG_SCANLINE;

export const BACKGROUND_INDEX = 0;

// ~256MB of RGBA
export const MAX_RENDER_PIXELS = 64_000_000;
export const BRIGHTNESS_MIN = 0.2;
export const BRIGHTNESS_MAX = 3.0;

export const DEFAULT_ALPHA_THRESHOLD = 8;
export const DEFAULT_MAX_UNDO_DEPTH = 100;
export const DEFAULT_MS_PER_FRAME = 150;
