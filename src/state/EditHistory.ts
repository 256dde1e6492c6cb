// EditHistory.ts
import { DEFAULT_MAX_UNDO_DEPTH } from "@/app/constants";
import type { Frame } from "@/types/SpriteTypes";

/**
 * Gesture-level undo/redo for one frame at a time. Snapshots are whole
 * pixel buffers. The stacks belong to the frame named by `anchor`; asking
 * to undo/redo on a different frame drops both stacks instead.
 */
export class EditHistory {
  private past: Uint8Array[] = [];
  private future: Uint8Array[] = [];
  private _anchor: number | undefined;

  constructor(private limit = DEFAULT_MAX_UNDO_DEPTH) {
    if (!Number.isInteger(limit) || limit < 1) throw new RangeError(`Undo limit must be a positive integer, got ${limit}`);
  }

  get anchor() { return this._anchor; }
  get maxDepth() { return this.limit; }
  get undoDepth() { return this.past.length; }
  get redoDepth() { return this.future.length; }
  get canUndo() { return this.past.length > 0; }
  get canRedo() { return this.future.length > 0; }

  /** Drop both stacks and re-anchor (load, new sprite). */
  clearHistory(anchor?: number) {
    this.past = [];
    this.future = [];
    this._anchor = anchor;
  }

  /** Active frame changed: history from another frame is discarded. */
  retarget(activeIndex: number) {
    if (this._anchor !== activeIndex) this.clearHistory(activeIndex);
  }

  setLimit(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) throw new RangeError(`Undo limit must be a positive integer, got ${limit}`);
    this.limit = limit;
    if (this.past.length > limit) this.past.splice(0, this.past.length - limit);
  }

  /** Call once at the start of a gesture, before the frame is touched. */
  record(frame: Frame, activeIndex: number) {
    this.retarget(activeIndex);
    this.past.push(frame.pixels.slice());
    if (this.past.length > this.limit) this.past.splice(0, this.past.length - this.limit);
    this.future = []; // forking timeline
  }

  /** Returns true when the frame's pixels were replaced. */
  undo(frame: Frame, activeIndex: number): boolean {
    return this.step(frame, activeIndex, this.past, this.future);
  }

  redo(frame: Frame, activeIndex: number): boolean {
    return this.step(frame, activeIndex, this.future, this.past);
  }

  private step(frame: Frame, activeIndex: number, from: Uint8Array[], to: Uint8Array[]): boolean {
    if (this._anchor !== undefined && this._anchor !== activeIndex) {
      this.clearHistory(activeIndex);
      return false;
    }
    const snapshot = from.pop();
    if (!snapshot) return false;
    to.push(frame.pixels);
    frame.pixels = snapshot;
    return true;
  }
}
