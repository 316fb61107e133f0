import type { CameraSnapshot, CameraStateHub } from '../camera/cameraHub.js';
import type { BackendKind, FrameRenderer, FrameResult } from './frameRenderer.js';

const MIN_FRAME_MS = 1;
const STATS_WINDOW = 60;

export type LoopFrame = {
  result: FrameResult;
  /** Camera snapshot the frame was rendered from. */
  snapshot: CameraSnapshot;
};

export type FrameLoopStats = {
  backend: BackendKind;
  frameCount: number;
  lastFrameMs: number;
  meanFrameMs: number;
  /** 1000 / last frame time, with the frame time floored at 1 ms. */
  fps: number;
  inFlight: boolean;
  queued: boolean;
};

export type FrameLoopOptions = {
  renderer: FrameRenderer;
  hub: CameraStateHub;
  onFrame?: (frame: LoopFrame) => void;
};

/** One status line in the form the viewer title bar shows. */
export const formatFrameStatus = (power: number, stats: FrameLoopStats): string =>
  `Power=${Math.round(power)} - ${stats.lastFrameMs.toFixed(1)} ms (${stats.fps.toFixed(1)} fps) [${stats.backend}]`;

/**
 * Pulls camera snapshots from the hub and renders them with back-pressure: at
 * most one frame is in flight and at most one follow-up is queued. Requests
 * made while a follow-up is already queued share it, and the follow-up reads
 * the camera only once the in-flight frame has finished.
 */
export class FrameLoop {
  private readonly renderer: FrameRenderer;
  private readonly hub: CameraStateHub;
  private readonly onFrame?: (frame: LoopFrame) => void;
  private readonly frameTimes: number[] = [];
  private current: Promise<LoopFrame> | null = null;
  private queued: Promise<LoopFrame> | null = null;
  private frameCount = 0;
  private lastFrameMs = 0;

  constructor(options: FrameLoopOptions) {
    this.renderer = options.renderer;
    this.hub = options.hub;
    this.onFrame = options.onFrame;
  }

  requestFrame(): Promise<LoopFrame> {
    if (this.queued) {
      return this.queued;
    }
    const current = this.current;
    if (!current) {
      return this.start();
    }
    const followUp = current.then(
      () => this.start(),
      () => this.start(),
    );
    this.queued = followUp;
    return followUp;
  }

  getStats(): FrameLoopStats {
    const meanFrameMs = this.frameTimes.length
      ? this.frameTimes.reduce((sum, value) => sum + value, 0) / this.frameTimes.length
      : 0;
    return {
      backend: this.renderer.getBackend(),
      frameCount: this.frameCount,
      lastFrameMs: this.lastFrameMs,
      meanFrameMs,
      fps: this.frameCount ? 1000 / Math.max(this.lastFrameMs, MIN_FRAME_MS) : 0,
      inFlight: this.current !== null,
      queued: this.queued !== null,
    };
  }

  private start(): Promise<LoopFrame> {
    this.queued = null;
    const run = this.renderSnapshot();
    this.current = run;
    const clear = () => {
      if (this.current === run) {
        this.current = null;
      }
    };
    run.then(clear, clear);
    return run;
  }

  private async renderSnapshot(): Promise<LoopFrame> {
    const snapshot = this.hub.getSnapshot();
    const result = await this.renderer.render(snapshot.camera);
    this.frameCount += 1;
    this.lastFrameMs = result.timeMs;
    this.frameTimes.push(result.timeMs);
    if (this.frameTimes.length > STATS_WINDOW) {
      this.frameTimes.shift();
    }
    const frame = { result, snapshot };
    this.onFrame?.(frame);
    return frame;
  }
}
