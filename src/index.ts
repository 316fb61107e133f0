export * from './math/vec3.js';
export * from './errors.js';
export * from './config/renderConfig.js';
export * from './config/loader.js';
export * from './camera/cameraState.js';
export * from './camera/cameraHub.js';
export * from './bulb/fieldEvaluator.js';
export * from './bulb/normalEstimator.js';
export * from './bulb/raymarcher.js';
export * from './shading/color.js';
export * from './shading/compositor.js';
export * from './render/params.js';
export * from './render/viewRay.js';
export * from './render/pixel.js';
export * from './render/frameBuffer.js';
export * from './render/frameProfiler.js';
export * from './render/frameRenderer.js';
export * from './render/bandProtocol.js';
export * from './render/cpuRenderer.js';
export * from './render/gpuTypes.js';
export * from './render/gpuRenderer.js';
export * from './render/frameLoop.js';
export * from './validation/parity.js';
export * from './validation/frameDigest.js';
