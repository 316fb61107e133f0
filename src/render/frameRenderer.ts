import type { CameraState } from '../camera/cameraState.js';
import type { RenderConfig } from '../config/renderConfig.js';
import type { FrameBuffer } from './frameBuffer.js';
import type { FrameProfileStats } from './frameProfiler.js';
import type { FrameParams } from './params.js';

export type BackendKind = 'cpu' | 'gpu';

export type FrameResult = {
  frame: FrameBuffer;
  backend: BackendKind;
  timeMs: number;
  /** Decoded uniform record the frame was rendered from. */
  params: FrameParams;
  /** The packed 32-byte record itself. */
  paramsBytes: ArrayBuffer;
};

/**
 * A backend that turns one camera snapshot into one frame. Implementations
 * render a single frame at a time; `render` rejects while another frame is in
 * flight (FrameLoop provides the queueing).
 */
export interface FrameRenderer {
  readonly config: Readonly<RenderConfig>;
  getBackend(): BackendKind;
  render(camera: Readonly<CameraState>): Promise<FrameResult>;
  getStats(): FrameProfileStats | null;
  dispose(): Promise<void>;
}
