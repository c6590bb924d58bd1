import { MAX_DRIFT } from "../config/constants.js";
import { clampUnit } from "./depth.js";
import { EntityPool } from "./EntityPool.js";

export enum SplashType {
  Symmetric = 0,
  LeftBiased = 1,
  RightBiased = 2,
  Scattered = 3,
}

export interface SplashSpawn {
  x: number;
  y: number;
  z: number;
  type: SplashType;
  /** Horizontal drift in cells, clamped to ±MAX_DRIFT. */
  drift: number;
}

/** Short-lived impact animations. `frame` counts ticks since the impact. */
export class Splashes extends EntityPool {
  readonly x: Float32Array;
  readonly y: Float32Array;
  readonly z: Float32Array;
  readonly frame: Uint8Array;
  readonly drift: Int8Array;
  readonly type: Uint8Array;

  constructor(capacity: number) {
    super(capacity);
    this.x = new Float32Array(capacity);
    this.y = new Float32Array(capacity);
    this.z = new Float32Array(capacity);
    this.frame = new Uint8Array(capacity);
    this.drift = new Int8Array(capacity);
    this.type = new Uint8Array(capacity);
  }

  spawn(p: SplashSpawn): number {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) return -1;
    const i = this.claim();
    if (i < 0) return -1;
    this.x[i] = p.x;
    this.y[i] = p.y;
    this.z[i] = clampUnit(p.z);
    this.frame[i] = 0;
    this.drift[i] = Number.isFinite(p.drift) ? Math.max(-MAX_DRIFT, Math.min(MAX_DRIFT, Math.round(p.drift))) : 0;
    this.type[i] = isSplashType(p.type) ? p.type : SplashType.Symmetric;
    return i;
  }

  /** Advance every animation by one tick and drop the ones that reached `lastFrame`. */
  advance(lastFrame: number): void {
    for (let i = 0; i < this.n; ) {
      const f = this.frame[i] + 1;
      if (f >= lastFrame) {
        this.remove(i);
        continue;
      }
      this.frame[i] = f;
      i++;
    }
  }

  protected moveSlot(from: number, to: number): void {
    this.x[to] = this.x[from];
    this.y[to] = this.y[from];
    this.z[to] = this.z[from];
    this.frame[to] = this.frame[from];
    this.drift[to] = this.drift[from];
    this.type[to] = this.type[from];
  }
}

export function isSplashType(v: number): v is SplashType {
  return v === SplashType.Symmetric || v === SplashType.LeftBiased || v === SplashType.RightBiased || v === SplashType.Scattered;
}
