import { v4 as uuid } from "uuid";
import { BACKGROUND_INDEX } from "@/app/constants";
import { createBlankSprite, defaultGrayscalePalette, fail, paletteToBytes, parsePaletteBytes, toHexColor } from "@/misc/Helpers";
import { createLogger, type Logger } from "@/misc/log";
import {
  drawCircle,
  drawLine,
  drawRect,
  fillCircle,
  fillRect,
  floodFill,
  pasteQuantized,
  pasteQuantizedCentered,
  stampDisc,
  stampLine,
} from "@/misc/raster";
import { exportFrameRgba, renderFrameRgba, type RgbaBuffer } from "@/misc/render";
import { decodeSprite, encodeSprite } from "@/services/ShpCodec";
import type { CodecResult, Palette, Point, RgbaImage, Sprite, Tool } from "@/types/SpriteTypes";
import { EditHistory } from "./EditHistory";
import { applySettingsChange, parseEditorSettings, type EditorSettings, type EditorSettingsInput, type SettingChange } from "./EditorSettings";
import { firstPalette, type PaletteCatalog } from "./PaletteCatalog";
import { Playback, monotonicClock, type Clock } from "./Playback";

export type EditorSessionOptions = {
  settings?: EditorSettingsInput;
  catalog?: PaletteCatalog;
  logger?: Logger;
  clock?: Clock;
};

type Stroke = { tool: Tool; start: Point; last: Point };

/** Pointer positions arrive in canvas units and may be fractional. */
const toCell = (x: number, y: number): Point => ({ x: Math.trunc(x), y: Math.trunc(y) });

/**
 * One editing session: owns the sprite, palette, history, playback and
 * tool state. Presentation code reads `render()` and calls the stroke
 * methods with canvas coordinates.
 */
export class EditorSession {
  readonly id = uuid();
  readonly history: EditHistory;
  readonly playback: Playback;

  settings: EditorSettings;
  sprite: Sprite | undefined;
  palette: Palette;
  paletteName: string;
  tool: Tool = "pencil";
  dirty = false;
  status = "";

  private stroke: Stroke | undefined;
  private log: Logger;

  constructor(opts: EditorSessionOptions = {}) {
    this.settings = parseEditorSettings(opts.settings ?? {});
    this.log = opts.logger ?? createLogger(`session ${this.id.slice(0, 8)}`, this.settings.logLevel);
    this.history = new EditHistory(this.settings.maxUndoDepth);
    this.playback = new Playback(this.settings.msPerFrame, opts.clock ?? monotonicClock);

    const first = opts.catalog ? firstPalette(opts.catalog) : undefined;
    this.palette = first?.palette ?? defaultGrayscalePalette();
    this.paletteName = first?.name ?? "Grayscale";
  }

  get activeFrame() { return this.playback.currentFrame; }
  get frameCount() { return this.sprite?.frames.length ?? 0; }
  get canUndo() { return this.history.canUndo; }
  get canRedo() { return this.history.canRedo; }
  get isStroking() { return this.stroke !== undefined; }
  get brushColorHex() { return toHexColor(this.palette[this.settings.brushIndex] ?? { r: 0, g: 0, b: 0 }); }

  // ---------- settings / tools ----------
  updateSettings(change: SettingChange) {
    this.settings = applySettingsChange(this.settings, change);
    this.history.setLimit(this.settings.maxUndoDepth);
    this.playback.msPerFrame = this.settings.msPerFrame;
  }

  setTool(tool: Tool) {
    this.stroke = undefined;
    this.tool = tool;
  }

  // ---------- documents ----------
  newSprite(
    width = this.settings.newSpriteDefaults.width,
    height = this.settings.newSpriteDefaults.height,
    frames = this.settings.newSpriteDefaults.frames
  ) {
    this.sprite = createBlankSprite(width, height, frames);
    this.resetDocumentState();
    this.status = `New sprite ${width}x${height}, ${frames} frame(s)`;
    this.log.info(this.status);
  }

  /** On failure the current sprite and history are left as they were. */
  loadSprite(bytes: Uint8Array): CodecResult<Sprite> {
    const res = decodeSprite(bytes);
    if (!res.ok) {
      this.status = `Load failed: ${res.error.message}`;
      this.log.warn(`load failed (${res.error.kind}): ${res.error.message}`);
      return res;
    }
    this.sprite = res.value;
    this.resetDocumentState();
    this.status = `Loaded sprite ${res.value.width}x${res.value.height}, ${res.value.frames.length} frame(s)`;
    this.log.info(this.status);
    return res;
  }

  saveSprite(): CodecResult<Uint8Array> {
    if (!this.sprite) return fail("EmptySprite", "No sprite loaded");
    const res = encodeSprite(this.sprite);
    if (!res.ok) {
      this.status = `Save failed: ${res.error.message}`;
      this.log.warn(`save failed (${res.error.kind}): ${res.error.message}`);
      return res;
    }
    this.dirty = false;
    this.status = `Saved ${res.value.length} bytes`;
    this.log.info(this.status);
    return res;
  }

  loadPalette(bytes: Uint8Array, name: string): CodecResult<Palette> {
    const res = parsePaletteBytes(bytes);
    if (!res.ok) {
      this.status = `Palette load failed: ${res.error.message}`;
      this.log.warn(this.status);
      return res;
    }
    this.selectPalette(name, res.value);
    return res;
  }

  savePalette(): Uint8Array {
    return paletteToBytes(this.palette);
  }

  /** The palette only changes how indices are shown, so this never marks the sprite dirty. */
  selectPalette(name: string, palette: Palette) {
    this.palette = palette;
    this.paletteName = name;
    this.status = `Palette: ${name}`;
    this.log.debug(this.status);
  }

  private resetDocumentState() {
    this.stroke = undefined;
    this.history.clearHistory(0);
    this.playback.reset();
    this.dirty = false;
  }

  // ---------- frames / playback ----------
  setActiveFrame(index: number) {
    const count = this.frameCount;
    if (count === 0) return;
    const next = Math.max(0, Math.min(count - 1, Math.trunc(index)));
    this.stroke = undefined;
    this.playback.currentFrame = next;
    this.history.retarget(next);
  }

  setPlaying(playing: boolean) {
    this.stroke = undefined;
    this.playback.setPlaying(playing);
  }

  /** Advance playback; returns the new frame index when it moved. */
  tick(now?: number): number | undefined {
    const moved = now === undefined ? this.playback.tick(this.frameCount) : this.playback.tick(this.frameCount, now);
    if (moved !== undefined) this.history.retarget(moved);
    return moved;
  }

  // ---------- strokes ----------
  /** Press. Records exactly one undo snapshot for the whole gesture. */
  beginStroke(px: number, py: number): boolean {
    const { x, y } = toCell(px, py);
    const s = this.sprite;
    const frame = s?.frames[this.activeFrame];
    if (!s || !frame) return false;

    const fi = this.activeFrame;
    const { brushSize, brushIndex } = this.settings;
    this.history.record(frame, fi);
    this.stroke = { tool: this.tool, start: { x, y }, last: { x, y } };

    switch (this.tool) {
      case "pencil":
        stampDisc(s, fi, x, y, brushSize, brushIndex);
        break;
      case "eraser":
        stampDisc(s, fi, x, y, brushSize, BACKGROUND_INDEX);
        break;
      case "fill":
        floodFill(s, fi, x, y, brushIndex);
        this.stroke = undefined;
        break;
      default:
        // shapes are drawn on release
        return true;
    }
    this.dirty = true;
    return true;
  }

  continueStroke(px: number, py: number) {
    const { x, y } = toCell(px, py);
    const s = this.sprite;
    const st = this.stroke;
    if (!s || !st) return;
    this.dragTo(s, st, x, y);
  }

  private dragTo(s: Sprite, st: Stroke, x: number, y: number) {
    if (st.tool === "pencil" || st.tool === "eraser") {
      const color = st.tool === "eraser" ? BACKGROUND_INDEX : this.settings.brushIndex;
      stampLine(s, this.activeFrame, st.last.x, st.last.y, x, y, this.settings.brushSize, color);
      this.dirty = true;
    }
    st.last = { x, y };
  }

  /** Release. Shape tools draw from the press point to here. */
  endStroke(px: number, py: number) {
    const { x, y } = toCell(px, py);
    const s = this.sprite;
    const st = this.stroke;
    if (!s || !st) return;
    this.stroke = undefined;

    const fi = this.activeFrame;
    const { brushIndex, fillMode } = this.settings;
    const { x: x0, y: y0 } = st.start;
    switch (st.tool) {
      case "pencil":
      case "eraser":
        this.dragTo(s, st, x, y);
        return;
      case "line":
        drawLine(s, fi, x0, y0, x, y, brushIndex);
        break;
      case "rectangle":
        if (fillMode) fillRect(s, fi, x0, y0, x, y, brushIndex);
        else drawRect(s, fi, x0, y0, x, y, brushIndex);
        break;
      case "circle": {
        const r = Math.trunc(Math.hypot(x - x0, y - y0));
        if (fillMode) fillCircle(s, fi, x0, y0, r, brushIndex);
        else drawCircle(s, fi, x0, y0, r, brushIndex);
        break;
      }
      case "fill":
        return;
    }
    this.dirty = true;
  }

  cancelStroke() {
    this.stroke = undefined;
  }

  // ---------- history ----------
  undo(): boolean {
    return this.stepHistory("undo");
  }

  redo(): boolean {
    return this.stepHistory("redo");
  }

  private stepHistory(dir: "undo" | "redo"): boolean {
    const frame = this.sprite?.frames[this.activeFrame];
    if (!frame) return false;
    const anchorBefore = this.history.anchor;
    const changed = dir === "undo"
      ? this.history.undo(frame, this.activeFrame)
      : this.history.redo(frame, this.activeFrame);

    if (changed) {
      this.dirty = true;
      this.status = dir === "undo" ? "Undone" : "Redone";
    } else if (anchorBefore !== undefined && anchorBefore !== this.activeFrame) {
      this.status = "Frame changed, history cleared";
      this.log.debug(`${dir} on frame ${this.activeFrame} dropped history of frame ${anchorBefore}`);
    }
    return changed;
  }

  // ---------- import / display ----------
  /** Quantize an already-decoded image into the active frame. Centred when no position is given. */
  importImage(image: RgbaImage, dest?: Point): boolean {
    const s = this.sprite;
    const frame = s?.frames[this.activeFrame];
    if (!s || !frame) return false;
    const fi = this.activeFrame;
    this.history.record(frame, fi);
    if (dest) pasteQuantized(s, fi, image, dest.x, dest.y, this.palette, this.settings.alphaThreshold);
    else pasteQuantizedCentered(s, fi, image, this.palette, this.settings.alphaThreshold);
    this.dirty = true;
    this.status = `Imported ${image.width}x${image.height} image into frame ${fi}`;
    this.log.info(this.status);
    return true;
  }

  render(): RgbaBuffer | undefined {
    if (!this.sprite) return undefined;
    return renderFrameRgba(this.sprite, this.palette, this.activeFrame, this.settings.brightness);
  }

  exportActiveFrame(): CodecResult<RgbaBuffer> {
    if (!this.sprite) return fail("EmptySprite", "No sprite loaded");
    return exportFrameRgba(this.sprite, this.palette, this.activeFrame);
  }
}
