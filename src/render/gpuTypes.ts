// Structural subset of the WebGPU API the renderer touches. Node has no
// WebGPU globals, so devices arrive through `navigator.gpu` when a host
// provides one, or through the `device` option.

export type GpuFlagTable = Readonly<Record<string, number>>;

export type GpuBufferDescriptor = {
  label?: string;
  size: number;
  usage: number;
};

export interface GpuBufferLike {
  readonly size: number;
  mapAsync(mode: number, offset?: number, size?: number): Promise<void>;
  getMappedRange(offset?: number, size?: number): ArrayBuffer;
  unmap(): void;
  destroy(): void;
}

export type GpuBindGroupEntry = {
  binding: number;
  resource: { buffer: GpuBufferLike };
};

export type GpuBindGroupLayoutLike = object;
export type GpuBindGroupLike = object;
export type GpuShaderModuleLike = object;
export type GpuCommandBufferLike = object;

export interface GpuComputePipelineLike {
  getBindGroupLayout(index: number): GpuBindGroupLayoutLike;
}

export type GpuComputePipelineDescriptor = {
  label?: string;
  layout: 'auto';
  compute: { module: GpuShaderModuleLike; entryPoint: string };
};

export interface GpuComputePassLike {
  setPipeline(pipeline: GpuComputePipelineLike): void;
  setBindGroup(index: number, group: GpuBindGroupLike): void;
  dispatchWorkgroups(x: number, y?: number, z?: number): void;
  end(): void;
}

export interface GpuCommandEncoderLike {
  beginComputePass(descriptor?: { label?: string }): GpuComputePassLike;
  copyBufferToBuffer(
    source: GpuBufferLike,
    sourceOffset: number,
    destination: GpuBufferLike,
    destinationOffset: number,
    size: number,
  ): void;
  finish(): GpuCommandBufferLike;
}

export interface GpuQueueLike {
  writeBuffer(buffer: GpuBufferLike, offset: number, data: ArrayBuffer | ArrayBufferView): void;
  submit(commandBuffers: GpuCommandBufferLike[]): void;
  onSubmittedWorkDone?(): Promise<void>;
}

export interface GpuDeviceLike {
  readonly queue: GpuQueueLike;
  createShaderModule(descriptor: { label?: string; code: string }): GpuShaderModuleLike;
  createComputePipeline(descriptor: GpuComputePipelineDescriptor): GpuComputePipelineLike;
  createComputePipelineAsync?(descriptor: GpuComputePipelineDescriptor): Promise<GpuComputePipelineLike>;
  createBuffer(descriptor: GpuBufferDescriptor): GpuBufferLike;
  createBindGroup(descriptor: {
    label?: string;
    layout: GpuBindGroupLayoutLike;
    entries: GpuBindGroupEntry[];
  }): GpuBindGroupLike;
  createCommandEncoder(descriptor?: { label?: string }): GpuCommandEncoderLike;
}

export interface GpuAdapterLike {
  requestDevice(): Promise<GpuDeviceLike>;
}

export interface GpuLike {
  requestAdapter(): Promise<GpuAdapterLike | null>;
}
