import { clampUnit } from "./depth.js";
import { EntityPool } from "./EntityPool.js";

export interface StreamSpawn {
  x: number;
  y: number;
  z: number;
  /** Remaining ticks, clamped to 1..255. */
  life: number;
}

/** Water running along flowing ground. */
export class Streams extends EntityPool {
  readonly x: Float32Array;
  readonly y: Float32Array;
  readonly z: Float32Array;
  readonly life: Uint8Array;

  constructor(capacity: number) {
    super(capacity);
    this.x = new Float32Array(capacity);
    this.y = new Float32Array(capacity);
    this.z = new Float32Array(capacity);
    this.life = new Uint8Array(capacity);
  }

  spawn(p: StreamSpawn): number {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) return -1;
    const i = this.claim();
    if (i < 0) return -1;
    this.x[i] = p.x;
    this.y[i] = p.y;
    this.z[i] = clampUnit(p.z);
    this.life[i] = Number.isFinite(p.life) ? Math.max(1, Math.min(255, Math.floor(p.life))) : 1;
    return i;
  }

  protected moveSlot(from: number, to: number): void {
    this.x[to] = this.x[from];
    this.y[to] = this.y[from];
    this.z[to] = this.z[from];
    this.life[to] = this.life[from];
  }
}
