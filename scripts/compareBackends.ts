import { dirname, join, resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

import { createCameraState, powerForPreset } from '../src/camera/cameraState.js';
import { loadRenderConfigFile } from '../src/config/loader.js';
import { CpuFrameRenderer } from '../src/render/cpuRenderer.js';
import { GpuFrameRenderer } from '../src/render/gpuRenderer.js';
import type { FrameRenderer } from '../src/render/frameRenderer.js';
import { compareFrames } from '../src/validation/parity.js';
import { digestFrame } from '../src/validation/frameDigest.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

type CliOptions = {
  config: string;
  preset: number;
  tolerance: number;
  workers?: number;
};

const readNumber = (flag: string, raw: string | undefined): number => {
  const value = Number(raw);
  if (raw == null || !Number.isFinite(value)) {
    throw new Error(`Invalid ${flag} value: ${raw}`);
  }
  return value;
};

const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = {
    config: join(__dirname, '..', 'config', 'render.default.json'),
    preset: 7,
    tolerance: 1,
  };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c': {
        options.config = argv[++i] ?? options.config;
        break;
      }
      case '--preset':
      case '-p': {
        options.preset = readNumber(arg, argv[++i]);
        break;
      }
      case '--tolerance': {
        options.tolerance = readNumber(arg, argv[++i]);
        break;
      }
      case '--workers': {
        options.workers = readNumber(arg, argv[++i]);
        break;
      }
      default: {
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
      }
    }
  }
  return options;
};

const main = async () => {
  const options = parseArgs(process.argv.slice(2));
  const loaded = await loadRenderConfigFile(resolve(process.cwd(), options.config));
  if (loaded.kind === 'error') {
    console.error(`[compare] ${loaded.sourceName ?? options.config}: ${loaded.message}`);
    for (const issue of loaded.issues ?? []) {
      console.error(`  ${issue.severity} ${issue.path}: ${issue.message}`);
    }
    process.exitCode = 1;
    return;
  }
  for (const issue of loaded.issues) {
    console.warn(`[compare] ${issue.path}: ${issue.message}`);
  }

  const camera = createCameraState({ power: powerForPreset(options.preset) });
  const renderers: FrameRenderer[] = [];
  try {
    const cpu = CpuFrameRenderer.create({ config: loaded.config, workerCount: options.workers });
    renderers.push(cpu);
    const gpu = await GpuFrameRenderer.create({ config: loaded.config, backend: 'auto' });
    renderers.push(gpu);

    const cpuResult = await cpu.render(camera);
    console.log(
      `[compare] cpu ${loaded.config.width}x${loaded.config.height} power=${camera.power} ${cpuResult.timeMs.toFixed(1)} ms`,
    );
    console.log(`[compare] cpu digest ${digestFrame(cpuResult.frame, cpuResult.paramsBytes)}`);

    if (gpu.getBackend() !== 'gpu') {
      console.warn('[compare] no GPU backend available; skipping parity check');
      return;
    }

    const gpuResult = await gpu.render(camera);
    console.log(`[compare] gpu ${gpuResult.timeMs.toFixed(1)} ms`);
    console.log(`[compare] gpu digest ${digestFrame(gpuResult.frame, gpuResult.paramsBytes)}`);
    const report = compareFrames(cpuResult.frame, gpuResult.frame, { tolerance: options.tolerance });
    console.log(
      `[compare] maxAbs=${report.maxAbs} rms=${report.rms.toFixed(4)} mismatched=${report.mismatchedPixels}/${report.pixelCount}`,
    );
    if (!report.withinTolerance) {
      console.error('[compare] backends diverge beyond tolerance');
      process.exitCode = 1;
    }
  } finally {
    await Promise.all(renderers.map((renderer) => renderer.dispose()));
  }
};

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
