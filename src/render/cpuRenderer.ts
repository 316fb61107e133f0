import { availableParallelism } from 'node:os';
import { Worker } from 'node:worker_threads';

import { assertPower, type CameraState } from '../camera/cameraState.js';
import {
  aspectRatio,
  createRenderConfig,
  type RenderConfig,
  type RenderConfigInit,
} from '../config/renderConfig.js';
import { bandByteLength, handleBandRequest, type BandRequest, type BandResponse } from './bandProtocol.js';
import { createFrameBuffer, partitionRowsByHeight, writeBand, type RowBand } from './frameBuffer.js';
import { defaultNow, FrameProfiler, type FrameProfileStats } from './frameProfiler.js';
import type { BackendKind, FrameRenderer, FrameResult } from './frameRenderer.js';
import { packParams, unpackParams } from './params.js';

const DEFAULT_BAND_HEIGHT = 8;

export type CpuFrameRendererOptions = {
  config?: RenderConfigInit;
  /** Worker threads to spawn; 0 renders every band on the calling thread. */
  workerCount?: number;
  /** Rows per band handed to a worker. */
  bandHeight?: number;
  now?: () => number;
  label?: string;
};

type PendingBand = {
  band: RowBand;
  frameId: number;
  resolve: (pixels: ArrayBuffer) => void;
  reject: (error: Error) => void;
};

type WorkerSlot = {
  worker: Worker;
  pending: PendingBand | null;
  failure: Error | null;
};

type WorkerEntry = { source: string | URL; eval: boolean };

/**
 * Compiled builds start `cpuWorker.js` directly. Under tsx the worker thread
 * does not inherit the loader hooks, so it boots from a small eval script that
 * registers tsx and then imports `cpuWorker.ts`.
 */
const resolveWorkerEntry = (): WorkerEntry => {
  if (!import.meta.url.endsWith('.ts')) {
    return { source: new URL('./cpuWorker.js', import.meta.url), eval: false };
  }
  const tsxApi = import.meta.resolve('tsx/esm/api');
  const entry = new URL('./cpuWorker.ts', import.meta.url).href;
  return {
    source: [
      `import(${JSON.stringify(tsxApi)})`,
      `  .then((api) => { api.register(); return import(${JSON.stringify(entry)}); });`,
    ].join('\n'),
    eval: true,
  };
};

const sanitizeWorkerCount = (value: number | undefined): number => {
  if (value == null) return Math.max(1, availableParallelism());
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.trunc(value);
};

/**
 * CPU backend. The frame is cut into row bands and each worker pulls the next
 * unclaimed band, so workers only ever write disjoint rows and the frame needs
 * no locking; it completes when every band has been joined.
 */
export class CpuFrameRenderer implements FrameRenderer {
  readonly config: Readonly<RenderConfig>;
  private readonly slots: WorkerSlot[];
  private readonly bandHeight: number;
  private readonly now: () => number;
  private readonly profiler = new FrameProfiler('cpu');
  private readonly label: string;
  private frameCounter = 0;
  private inFlight = false;
  private disposed = false;

  private constructor(config: RenderConfig, slots: WorkerSlot[], options: CpuFrameRendererOptions) {
    this.config = Object.freeze({ ...config });
    this.slots = slots;
    this.bandHeight = Math.max(1, Math.trunc(options.bandHeight ?? DEFAULT_BAND_HEIGHT));
    this.now = options.now ?? defaultNow;
    this.label = options.label ?? 'bulb-cpu';
    for (const slot of slots) {
      this.attach(slot);
    }
  }

  static create(options: CpuFrameRendererOptions = {}): CpuFrameRenderer {
    const config = createRenderConfig(options.config);
    const workerCount = sanitizeWorkerCount(options.workerCount);
    const entry = resolveWorkerEntry();
    const slots: WorkerSlot[] = [];
    for (let i = 0; i < workerCount; i++) {
      const worker = new Worker(entry.source, {
        eval: entry.eval,
        name: `${options.label ?? 'bulb-cpu'}-${i}`,
      });
      slots.push({ worker, pending: null, failure: null });
    }
    return new CpuFrameRenderer(config, slots, options);
  }

  getBackend(): BackendKind {
    return 'cpu';
  }

  getWorkerCount(): number {
    return this.slots.length;
  }

  getStats(): FrameProfileStats | null {
    return this.profiler.getStats();
  }

  async render(camera: Readonly<CameraState>): Promise<FrameResult> {
    if (this.disposed) {
      throw new Error(`[${this.label}] renderer has been disposed`);
    }
    if (this.inFlight) {
      throw new Error(`[${this.label}] render called while a frame is in flight`);
    }
    assertPower(camera.power);
    this.inFlight = true;
    try {
      return await this.renderFrame(camera);
    } finally {
      this.inFlight = false;
    }
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await Promise.all(this.slots.map((slot) => slot.worker.terminate()));
  }

  private async renderFrame(camera: Readonly<CameraState>): Promise<FrameResult> {
    const start = this.now();
    const frameId = ++this.frameCounter;
    const config = this.config;
    const paramsBytes = packParams(camera, aspectRatio(config));
    const frame = createFrameBuffer(config.width, config.height);
    const queue = partitionRowsByHeight(config.height, this.bandHeight);

    if (this.slots.length === 0) {
      for (const band of queue) {
        writeBand(frame, band, new Uint8ClampedArray(this.renderInline(frameId, band, paramsBytes)));
      }
    } else {
      const drain = async (slot: WorkerSlot) => {
        for (let band = queue.shift(); band; band = queue.shift()) {
          const pixels = await this.dispatch(slot, frameId, band, paramsBytes);
          writeBand(frame, band, new Uint8ClampedArray(pixels));
        }
      };
      await Promise.all(this.slots.map((slot) => drain(slot)));
    }

    const timeMs = this.now() - start;
    this.profiler.record(timeMs, config.width * config.height);
    return {
      frame,
      backend: 'cpu',
      timeMs,
      params: unpackParams(paramsBytes),
      paramsBytes,
    };
  }

  private request(frameId: number, band: RowBand, params: ArrayBuffer): BandRequest {
    return { kind: 'band', frameId, band, params, config: { ...this.config } };
  }

  private renderInline(frameId: number, band: RowBand, params: ArrayBuffer): ArrayBuffer {
    const response = handleBandRequest(this.request(frameId, band, params));
    if (response.kind === 'error') {
      throw new Error(`[${this.label}] band ${response.bandIndex} failed: ${response.message}`);
    }
    return response.pixels;
  }

  private dispatch(
    slot: WorkerSlot,
    frameId: number,
    band: RowBand,
    params: ArrayBuffer,
  ): Promise<ArrayBuffer> {
    if (slot.failure) {
      return Promise.reject(slot.failure);
    }
    return new Promise<ArrayBuffer>((resolve, reject) => {
      slot.pending = { band, frameId, resolve, reject };
      slot.worker.postMessage(this.request(frameId, band, params));
    });
  }

  private attach(slot: WorkerSlot) {
    slot.worker.on('message', (response: BandResponse) => {
      const pending = slot.pending;
      if (!pending || pending.frameId !== response.frameId || pending.band.index !== response.bandIndex) {
        console.warn(`[${this.label}] dropping stale band response`, response.frameId, response.bandIndex);
        return;
      }
      slot.pending = null;
      if (response.kind === 'error') {
        pending.reject(new Error(`[${this.label}] band ${response.bandIndex} failed: ${response.message}`));
        return;
      }
      const expected = bandByteLength(pending.band, this.config.width);
      if (response.pixels.byteLength !== expected) {
        pending.reject(
          new Error(`[${this.label}] band ${response.bandIndex} returned ${response.pixels.byteLength} bytes, expected ${expected}`),
        );
        return;
      }
      pending.resolve(response.pixels);
    });
    const fail = (error: Error) => {
      slot.failure = error;
      const pending = slot.pending;
      slot.pending = null;
      pending?.reject(error);
    };
    slot.worker.on('error', (error: Error) => {
      console.error(`[${this.label}] worker failed`, error);
      fail(error);
    });
    slot.worker.on('exit', (code: number) => {
      if (!this.disposed) {
        fail(new Error(`[${this.label}] worker exited with code ${code}`));
      }
    });
  }
}
