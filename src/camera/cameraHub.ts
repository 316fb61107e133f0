import {
  createCameraState,
  snapshotCamera,
  type CameraState,
  type CameraStateInit,
} from './cameraState.js';

const now = () => {
  if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
    return performance.now();
  }
  return Date.now();
};

type CameraField = keyof CameraState;

export type CameraSnapshot = Readonly<{
  camera: Readonly<CameraState>;
  version: number;
  timestamp: number;
  source: string;
  changed: readonly CameraField[];
}>;

export type CameraSubscriber = (snapshot: CameraSnapshot) => void;

const EPS = 1e-9;

const differs = (a: number, b: number) => Math.abs(a - b) > EPS;

const computeChangedFields = (prev: CameraState, next: CameraState): CameraField[] => {
  const fields: CameraField[] = [];
  if (
    differs(prev.position.x, next.position.x) ||
    differs(prev.position.y, next.position.y) ||
    differs(prev.position.z, next.position.z)
  ) {
    fields.push('position');
  }
  if (differs(prev.yaw, next.yaw)) fields.push('yaw');
  if (differs(prev.pitch, next.pitch)) fields.push('pitch');
  if (differs(prev.power, next.power)) fields.push('power');
  if (differs(prev.time, next.time)) fields.push('time');
  return fields;
};

const freezeSnapshot = (
  camera: CameraState,
  version: number,
  timestamp: number,
  source: string,
  changed: CameraField[],
): CameraSnapshot =>
  Object.freeze({
    camera: snapshotCamera(camera),
    version,
    timestamp,
    source,
    changed: Object.freeze([...changed]),
  });

/**
 * Owns the session's camera. Input handlers call `update`; each frame takes one
 * immutable snapshot through `getSnapshot`, so a render never observes a
 * half-applied change.
 */
export class CameraStateHub {
  private snapshot: CameraSnapshot;
  private readonly subscribers = new Set<CameraSubscriber>();
  private pending: CameraSnapshot | null = null;
  private scheduled = false;

  constructor(initial?: CameraStateInit, source = 'init') {
    this.snapshot = freezeSnapshot(createCameraState(initial), 0, now(), source, [
      'position',
      'yaw',
      'pitch',
      'power',
      'time',
    ]);
  }

  getSnapshot(): CameraSnapshot {
    return this.snapshot;
  }

  subscribe(listener: CameraSubscriber, options?: { immediate?: boolean }): () => void {
    this.subscribers.add(listener);
    if (options?.immediate ?? true) {
      listener(this.snapshot);
    }
    return () => {
      this.subscribers.delete(listener);
    };
  }

  /** Merges `update`, re-sanitizing power and time. Returns null when nothing changed. */
  update(update: CameraStateInit, options?: { source?: string; force?: boolean }): CameraSnapshot | null {
    const previous = this.snapshot.camera;
    const merged = createCameraState({ ...previous, ...update });
    if (merged.time < previous.time) {
      merged.time = previous.time;
    }
    const changed = computeChangedFields(previous, merged);
    if (!options?.force && changed.length === 0) {
      return null;
    }
    this.snapshot = freezeSnapshot(
      merged,
      this.snapshot.version + 1,
      now(),
      options?.source ?? 'unspecified',
      changed,
    );
    this.enqueueBroadcast(this.snapshot);
    return this.snapshot;
  }

  /** Applies a pure camera transition (see moveCamera, rotateCamera, advanceTime). */
  apply(
    transition: (camera: CameraState) => CameraState,
    options?: { source?: string },
  ): CameraSnapshot | null {
    const current = this.snapshot.camera;
    const next = transition({ ...current, position: { ...current.position } });
    return this.update(next, options);
  }

  private enqueueBroadcast(snapshot: CameraSnapshot) {
    this.pending = snapshot;
    if (this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => this.flush());
  }

  private flush() {
    this.scheduled = false;
    const snapshot = this.pending;
    if (!snapshot) return;
    this.pending = null;
    for (const subscriber of this.subscribers) {
      subscriber(snapshot);
    }
  }

  getDiagnostics() {
    return {
      subscriberCount: this.subscribers.size,
      lastVersion: this.snapshot.version,
      lastSource: this.snapshot.source,
    };
  }
}
