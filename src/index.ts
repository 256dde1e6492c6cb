export * from "@/app/constants";
export type * from "@/types/SpriteTypes";
export {
  cloneFrame,
  createBlankSprite,
  defaultGrayscalePalette,
  isFrameEmpty,
  paletteToBytes,
  parsePaletteBytes,
  toHexColor,
} from "@/misc/Helpers";
export { bestIndex } from "@/misc/colorMatch";
export {
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
} from "@/misc/raster";
export { exportFrameRgba, placeholderRgba, renderFrameRgba, type RgbaBuffer } from "@/misc/render";
export { createLogger, silentLogger, type LogLevel, type Logger } from "@/misc/log";
export { decodeSprite, encodeSprite, frameEncoding } from "@/services/ShpCodec";
export { EditHistory } from "@/state/EditHistory";
export { Playback, monotonicClock, type Clock } from "@/state/Playback";
export {
  catalogFromEntries,
  findPalette,
  firstPalette,
  loadPaletteCatalog,
  type PaletteCatalog,
  type PaletteEntry,
  type PaletteSource,
} from "@/state/PaletteCatalog";
export {
  EditorSettingsSchema,
  applySettingsChange,
  parseEditorSettings,
  safeParseEditorSettings,
  type EditorSettings,
  type EditorSettingsInput,
  type SettingChange,
} from "@/state/EditorSettings";
export { EditorSession, type EditorSessionOptions } from "@/state/EditorSession";
