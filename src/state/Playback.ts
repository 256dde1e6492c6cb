import { performance } from "node:perf_hooks";
import { DEFAULT_MS_PER_FRAME } from "@/app/constants";

export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

/** Animation preview. Elapsed time accumulates; whole frame periods advance the frame and the remainder carries over. */
export class Playback {
  playing = false;
  currentFrame = 0;
  accumulatorMs = 0;
  private lastTick: number;

  constructor(public msPerFrame = DEFAULT_MS_PER_FRAME, private clock: Clock = monotonicClock) {
    this.lastTick = clock();
  }

  setPlaying(playing: boolean) {
    if (playing && !this.playing) {
      this.lastTick = this.clock();
      this.accumulatorMs = 0;
    }
    this.playing = playing;
  }

  reset() {
    this.playing = false;
    this.currentFrame = 0;
    this.accumulatorMs = 0;
    this.lastTick = this.clock();
  }

  /** Returns the new frame index if at least one advance happened. */
  tick(frameCount: number, now = this.clock()): number | undefined {
    if (!this.playing || frameCount <= 0) return undefined;
    const dt = Math.max(0, now - this.lastTick);
    this.lastTick = now;
    this.accumulatorMs += dt;
    if (this.msPerFrame <= 0) return undefined;

    let advanced = 0;
    while (this.accumulatorMs >= this.msPerFrame) {
      this.accumulatorMs -= this.msPerFrame;
      this.currentFrame = (this.currentFrame + 1) % frameCount;
      advanced++;
    }
    return advanced > 0 ? this.currentFrame : undefined;
  }
}
