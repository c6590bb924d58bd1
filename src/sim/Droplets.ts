import { clampUnit, lerp } from "./depth.js";
import { EntityPool } from "./EntityPool.js";

export interface DropletSpawn {
  x: number;
  y: number;
  /** 0 = near, 1 = far. */
  z: number;
  /** Fall speed in rows per tick. Invalid values fall back to the depth-derived speed. */
  v: number;
}

export interface FallSpeeds {
  velNear: number;
  velFar: number;
}

/** Falling droplets. */
export class Droplets extends EntityPool {
  readonly x: Float32Array;
  readonly y: Float32Array;
  readonly z: Float32Array;
  readonly v: Float32Array;
  private readonly speeds: FallSpeeds;

  constructor(capacity: number, speeds: FallSpeeds) {
    super(capacity);
    this.speeds = speeds;
    this.x = new Float32Array(capacity);
    this.y = new Float32Array(capacity);
    this.z = new Float32Array(capacity);
    this.v = new Float32Array(capacity);
  }

  /** Insert a droplet; returns its index, or -1 when full or the position is not finite. */
  spawn(p: DropletSpawn): number {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) return -1;
    const i = this.claim();
    if (i < 0) return -1;
    const z = clampUnit(p.z);
    this.x[i] = p.x;
    this.y[i] = p.y;
    this.z[i] = z;
    this.v[i] = Number.isFinite(p.v) && p.v > 0 ? p.v : lerp(this.speeds.velNear, this.speeds.velFar, z);
    return i;
  }

  protected moveSlot(from: number, to: number): void {
    this.x[to] = this.x[from];
    this.y[to] = this.y[from];
    this.z[to] = this.z[from];
    this.v[to] = this.v[from];
  }
}
