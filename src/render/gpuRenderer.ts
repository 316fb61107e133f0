import { assertPower, type CameraState } from '../camera/cameraState.js';
import {
  aspectRatio,
  createRenderConfig,
  type RenderConfig,
  type RenderConfigInit,
} from '../config/renderConfig.js';
import { CpuFrameRenderer, type CpuFrameRendererOptions } from './cpuRenderer.js';
import { BYTES_PER_PIXEL, createFrameBuffer, type FrameBuffer } from './frameBuffer.js';
import { defaultNow, FrameProfiler, type FrameProfileStats } from './frameProfiler.js';
import type { BackendKind, FrameRenderer, FrameResult } from './frameRenderer.js';
import type {
  GpuBindGroupLike,
  GpuBufferLike,
  GpuComputePipelineDescriptor,
  GpuComputePipelineLike,
  GpuDeviceLike,
  GpuFlagTable,
  GpuLike,
} from './gpuTypes.js';
import { PARAMS_BYTE_LENGTH, packParams, unpackParams } from './params.js';

export const GPU_WORKGROUP_SIZE = 8;
export const FRAME_INFO_BYTE_LENGTH = 48;

/**
 * FrameInfo uniform: four u32 counters followed by five f32 tolerances,
 * padded to 48 bytes.
 */
export const FRAME_INFO_LAYOUT = Object.freeze({
  width: 0,
  height: 4,
  maxSteps: 8,
  maxIter: 12,
  bailout: 16,
  epsilon: 20,
  normalEpsilon: 24,
  damping: 28,
  maxDistance: 32,
} as const);

const FALLBACK_GPU_BUFFER_USAGE: GpuFlagTable = {
  MAP_READ: 0x0001,
  MAP_WRITE: 0x0002,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
  UNIFORM: 0x0040,
  STORAGE: 0x0080,
} as const;

const FALLBACK_GPU_MAP_MODE: GpuFlagTable = {
  READ: 0x0001,
  WRITE: 0x0002,
} as const;

type MaybeGpuEnvironment = {
  GPUBufferUsage?: GpuFlagTable;
  GPUMapMode?: GpuFlagTable;
  navigator?: { gpu?: GpuLike };
};

const gpuEnvironment: MaybeGpuEnvironment =
  typeof globalThis === 'undefined' ? {} : (globalThis as MaybeGpuEnvironment);

const GPU_BUFFER_USAGE: GpuFlagTable = gpuEnvironment.GPUBufferUsage ?? FALLBACK_GPU_BUFFER_USAGE;

const GPU_MAP_MODE: GpuFlagTable = gpuEnvironment.GPUMapMode ?? FALLBACK_GPU_MAP_MODE;

const usage = (...flags: string[]): number =>
  flags.reduce((mask, flag) => mask | (GPU_BUFFER_USAGE[flag] ?? 0), 0);

let cachedShaderSource: string | null = null;

/** WGSL source of the bulb kernel, read beside this module (or from src/ when running a build). */
export const loadBulbShaderSource = async (): Promise<string> => {
  if (cachedShaderSource) {
    return cachedShaderSource;
  }
  const [{ readFile }, { fileURLToPath }, { resolve, dirname }] = await Promise.all([
    import('node:fs/promises'),
    import('node:url'),
    import('node:path'),
  ]);
  const baseDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    resolve(baseDir, 'shaders', 'bulb.wgsl'),
    resolve(baseDir, '..', '..', '..', 'src', 'render', 'shaders', 'bulb.wgsl'),
  ];
  let lastError: unknown = null;
  for (const candidate of candidates) {
    try {
      cachedShaderSource = await readFile(candidate, 'utf8');
      return cachedShaderSource;
    } catch (error) {
      lastError = error;
    }
  }
  throw new Error(`[bulb-gpu] unable to read bulb.wgsl: ${String(lastError)}`);
};

export const packFrameInfo = (config: RenderConfig, target?: ArrayBuffer | null): ArrayBuffer => {
  const buffer =
    target && target.byteLength === FRAME_INFO_BYTE_LENGTH ? target : new ArrayBuffer(FRAME_INFO_BYTE_LENGTH);
  const view = new DataView(buffer);
  view.setUint32(FRAME_INFO_LAYOUT.width, config.width, true);
  view.setUint32(FRAME_INFO_LAYOUT.height, config.height, true);
  view.setUint32(FRAME_INFO_LAYOUT.maxSteps, config.maxSteps, true);
  view.setUint32(FRAME_INFO_LAYOUT.maxIter, config.maxIter, true);
  view.setFloat32(FRAME_INFO_LAYOUT.bailout, config.bailout, true);
  view.setFloat32(FRAME_INFO_LAYOUT.epsilon, config.epsilon, true);
  view.setFloat32(FRAME_INFO_LAYOUT.normalEpsilon, config.normalEpsilon, true);
  view.setFloat32(FRAME_INFO_LAYOUT.damping, config.damping, true);
  view.setFloat32(FRAME_INFO_LAYOUT.maxDistance, config.maxDistance, true);
  return buffer;
};

/** Config as the shader sees it (tolerances rounded to f32). */
export const unpackFrameInfo = (source: ArrayBuffer | ArrayBufferView): RenderConfig => {
  const view =
    source instanceof ArrayBuffer
      ? new DataView(source)
      : new DataView(source.buffer, source.byteOffset, source.byteLength);
  if (view.byteLength < FRAME_INFO_BYTE_LENGTH) {
    throw new Error(
      `[bulb-gpu] expected at least ${FRAME_INFO_BYTE_LENGTH} frame info bytes, received ${view.byteLength}`,
    );
  }
  return {
    width: view.getUint32(FRAME_INFO_LAYOUT.width, true),
    height: view.getUint32(FRAME_INFO_LAYOUT.height, true),
    maxSteps: view.getUint32(FRAME_INFO_LAYOUT.maxSteps, true),
    maxIter: view.getUint32(FRAME_INFO_LAYOUT.maxIter, true),
    bailout: view.getFloat32(FRAME_INFO_LAYOUT.bailout, true),
    epsilon: view.getFloat32(FRAME_INFO_LAYOUT.epsilon, true),
    normalEpsilon: view.getFloat32(FRAME_INFO_LAYOUT.normalEpsilon, true),
    damping: view.getFloat32(FRAME_INFO_LAYOUT.damping, true),
    maxDistance: view.getFloat32(FRAME_INFO_LAYOUT.maxDistance, true),
  };
};

/** Packs one RGBA8 texel the way the shader stores it: r | g<<8 | b<<16 | a<<24. */
export const packPixel = (r: number, g: number, b: number, a = 255): number =>
  ((r & 0xff) | ((g & 0xff) << 8) | ((b & 0xff) << 16) | ((a & 0xff) << 24)) >>> 0;

/** Expands packed u32 texels into the frame's RGBA bytes. */
export const unpackPixels = (words: Uint32Array, frame: FrameBuffer): FrameBuffer => {
  const expected = frame.width * frame.height;
  if (words.length !== expected) {
    throw new Error(`[bulb-gpu] expected ${expected} packed pixels, received ${words.length}`);
  }
  const data = frame.data;
  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    const base = i * BYTES_PER_PIXEL;
    data[base] = word & 0xff;
    data[base + 1] = (word >>> 8) & 0xff;
    data[base + 2] = (word >>> 16) & 0xff;
    data[base + 3] = (word >>> 24) & 0xff;
  }
  return frame;
};

export type GpuBackendPreference = 'auto' | 'gpu-first' | 'cpu-only';

export type GpuFrameRendererOptions = {
  config?: RenderConfigInit;
  backend?: GpuBackendPreference;
  /** Device to render on; defaults to navigator.gpu when the host exposes it. */
  device?: GpuDeviceLike | null;
  /** Options for the CPU renderer used when no GPU backend is available. */
  fallback?: Omit<CpuFrameRendererOptions, 'config'>;
  now?: () => number;
  label?: string;
};

type GpuState = {
  device: GpuDeviceLike;
  pipeline: GpuComputePipelineLike;
  paramsBuffer: GpuBufferLike;
  frameInfoBuffer: GpuBufferLike;
  pixelBuffer: GpuBufferLike;
  readbackBuffer: GpuBufferLike;
  bindGroup: GpuBindGroupLike;
};

const requestNavigatorDevice = async (): Promise<GpuDeviceLike | null> => {
  const gpu = gpuEnvironment.navigator?.gpu;
  if (!gpu) {
    return null;
  }
  try {
    const adapter = await gpu.requestAdapter();
    return adapter ? await adapter.requestDevice() : null;
  } catch (error) {
    console.warn('[bulb-gpu] adapter request failed', error);
    return null;
  }
};

const createPipeline = async (
  device: GpuDeviceLike,
  descriptor: GpuComputePipelineDescriptor,
): Promise<GpuComputePipelineLike> =>
  device.createComputePipelineAsync
    ? device.createComputePipelineAsync(descriptor)
    : device.createComputePipeline(descriptor);

/**
 * WebGPU backend. Config-sized buffers and the bind group are built once; each
 * frame uploads the 32-byte Params record, dispatches 8×8 workgroups over the
 * image and reads the packed pixels back.
 */
export class GpuFrameRenderer implements FrameRenderer {
  readonly config: Readonly<RenderConfig>;
  private readonly now: () => number;
  private readonly profiler = new FrameProfiler('gpu');
  private readonly label: string;
  private gpu: GpuState | null;
  private inFlight = false;

  private constructor(config: RenderConfig, gpu: GpuState, options: GpuFrameRendererOptions) {
    this.config = Object.freeze({ ...config });
    this.gpu = gpu;
    this.now = options.now ?? defaultNow;
    this.label = options.label ?? 'bulb-gpu';
  }

  /** Resolves a GPU renderer, or a CPU renderer when the GPU path is unavailable. */
  static async create(options: GpuFrameRendererOptions = {}): Promise<FrameRenderer> {
    const backendPref = options.backend ?? 'auto';
    const config = createRenderConfig(options.config);
    const fallback = () =>
      CpuFrameRenderer.create({ ...options.fallback, config, now: options.now });

    if (backendPref === 'cpu-only') {
      return fallback();
    }

    const device = options.device ?? (await requestNavigatorDevice());
    if (!device) {
      if (backendPref === 'gpu-first') {
        throw new Error('[bulb-gpu] WebGPU device unavailable');
      }
      console.warn('[bulb-gpu] no WebGPU device, rendering on the CPU backend');
      return fallback();
    }

    try {
      const gpu = await GpuFrameRenderer.initialize(device, config, options.label ?? 'bulb-gpu');
      return new GpuFrameRenderer(config, gpu, options);
    } catch (error) {
      console.warn('[bulb-gpu] falling back to CPU backend', error);
      if (backendPref === 'gpu-first') {
        throw new Error('[bulb-gpu] failed to initialize GPU backend');
      }
      return fallback();
    }
  }

  private static async initialize(
    device: GpuDeviceLike,
    config: RenderConfig,
    label: string,
  ): Promise<GpuState> {
    const code = await loadBulbShaderSource();
    const module = device.createShaderModule({ label, code });
    const pipeline = await createPipeline(device, {
      layout: 'auto',
      label,
      compute: { module, entryPoint: 'main' },
    });
    const pixelBytes = config.width * config.height * Uint32Array.BYTES_PER_ELEMENT;
    const paramsBuffer = device.createBuffer({
      label: `${label}-params`,
      size: PARAMS_BYTE_LENGTH,
      usage: usage('UNIFORM', 'COPY_DST'),
    });
    const frameInfoBuffer = device.createBuffer({
      label: `${label}-frame-info`,
      size: FRAME_INFO_BYTE_LENGTH,
      usage: usage('UNIFORM', 'COPY_DST'),
    });
    const pixelBuffer = device.createBuffer({
      label: `${label}-pixels`,
      size: pixelBytes,
      usage: usage('STORAGE', 'COPY_SRC'),
    });
    const readbackBuffer = device.createBuffer({
      label: `${label}-readback`,
      size: pixelBytes,
      usage: usage('COPY_DST', 'MAP_READ'),
    });
    const bindGroup = device.createBindGroup({
      label: `${label}-bind-group`,
      layout: pipeline.getBindGroupLayout(0),
      entries: [
        { binding: 0, resource: { buffer: paramsBuffer } },
        { binding: 1, resource: { buffer: pixelBuffer } },
        { binding: 2, resource: { buffer: frameInfoBuffer } },
      ],
    });
    device.queue.writeBuffer(frameInfoBuffer, 0, packFrameInfo(config));
    return { device, pipeline, paramsBuffer, frameInfoBuffer, pixelBuffer, readbackBuffer, bindGroup };
  }

  getBackend(): BackendKind {
    return 'gpu';
  }

  getStats(): FrameProfileStats | null {
    return this.profiler.getStats();
  }

  async render(camera: Readonly<CameraState>): Promise<FrameResult> {
    if (!this.gpu) {
      throw new Error(`[${this.label}] renderer has been disposed`);
    }
    if (this.inFlight) {
      throw new Error(`[${this.label}] render called while a frame is in flight`);
    }
    assertPower(camera.power);
    this.inFlight = true;
    try {
      return await this.renderFrame(this.gpu, camera);
    } finally {
      this.inFlight = false;
    }
  }

  async dispose(): Promise<void> {
    if (!this.gpu) return;
    const { paramsBuffer, frameInfoBuffer, pixelBuffer, readbackBuffer } = this.gpu;
    paramsBuffer.destroy();
    frameInfoBuffer.destroy();
    pixelBuffer.destroy();
    readbackBuffer.destroy();
    this.gpu = null;
  }

  private async renderFrame(gpu: GpuState, camera: Readonly<CameraState>): Promise<FrameResult> {
    const start = this.now();
    const { width, height } = this.config;
    const paramsBytes = packParams(camera, aspectRatio(this.config));
    const queue = gpu.device.queue;
    queue.writeBuffer(gpu.paramsBuffer, 0, paramsBytes);

    const encoder = gpu.device.createCommandEncoder({ label: `${this.label}-commands` });
    const pass = encoder.beginComputePass({ label: `${this.label}-pass` });
    pass.setPipeline(gpu.pipeline);
    pass.setBindGroup(0, gpu.bindGroup);
    pass.dispatchWorkgroups(
      Math.ceil(width / GPU_WORKGROUP_SIZE),
      Math.ceil(height / GPU_WORKGROUP_SIZE),
    );
    pass.end();
    const byteLength = width * height * Uint32Array.BYTES_PER_ELEMENT;
    encoder.copyBufferToBuffer(gpu.pixelBuffer, 0, gpu.readbackBuffer, 0, byteLength);
    queue.submit([encoder.finish()]);
    await (queue.onSubmittedWorkDone?.() ?? Promise.resolve());

    await gpu.readbackBuffer.mapAsync(GPU_MAP_MODE.READ);
    const frame = createFrameBuffer(width, height);
    try {
      // Copy out before unmap detaches the mapped range.
      const words = new Uint32Array(gpu.readbackBuffer.getMappedRange(0, byteLength).slice(0));
      unpackPixels(words, frame);
    } finally {
      gpu.readbackBuffer.unmap();
    }

    const timeMs = this.now() - start;
    this.profiler.record(timeMs, width * height);
    return {
      frame,
      backend: 'gpu',
      timeMs,
      params: unpackParams(paramsBytes),
      paramsBytes,
    };
  }
}
