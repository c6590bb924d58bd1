import { TRAILS } from "../config/constants.js";
import { depthBucket } from "../sim/depth.js";
import type { Droplets } from "../sim/Droplets.js";
import type { Splashes } from "../sim/Splashes.js";
import type { Streams } from "../sim/Streams.js";
import { dropletCode, splashCode, streamCode } from "./cellCodes.js";
import splashPatterns from "./splashPatterns.json" with { type: "json" };

/** Placement table for one splash type: per phase, flat [sx, dx, sy, glyph] quads. */
type PhaseTable = readonly Int8Array[];

const PHASES = 8;

function compilePatterns(types: readonly (readonly (readonly (readonly number[])[])[])[]): readonly PhaseTable[] {
  return types.map((phases, t) => {
    if (phases.length !== PHASES) throw new Error(`[encoder] splash type ${t} has ${phases.length} phases`);
    return phases.map((entries, p) => {
      const flat = new Int8Array(entries.length * 4);
      entries.forEach((entry, e) => {
        if (entry.length !== 4) throw new Error(`[encoder] splash type ${t} phase ${p} entry ${e} is malformed`);
        flat.set(entry, e * 4);
      });
      return flat;
    });
  });
}

const SPLASH_TABLES = compilePatterns(splashPatterns.types);
const TINY_GLYPHS = Uint8Array.from(splashPatterns.tiny);

/** Stream size variant from remaining life. */
export function streamSize(life: number): number {
  if (life > 80) return 3;
  if (life > 40) return 2;
  if (life > 10) return 1;
  return 0;
}

/** Trail length in cells, longer for near droplets. */
export function trailLength(z: number): number {
  return Math.max(1, Math.floor(5 - z * 4));
}

/** Splash size multiplier: 0 (single glyph), 1 or 2. */
export function splashScale(z: number): number {
  return Math.floor((1 - z) * 2.5);
}

/**
 * Writes entity state into the one-byte-per-cell frame buffer.
 *
 * A cell keeps the largest code written to it. Code ranges ascend
 * droplet < splash < stream, so streams cover splashes cover droplets,
 * and within a kind the nearer bucket wins.
 */
export class FrameEncoder {
  private buf: Uint8Array;
  private w: number;
  private h: number;

  constructor(width: number, height: number) {
    this.w = width;
    this.h = height;
    this.buf = new Uint8Array(width * height);
  }

  get width(): number {
    return this.w;
  }

  get height(): number {
    return this.h;
  }

  /** The live buffer; contents change on the next encode() or resize(). */
  get buffer(): Uint8Array {
    return this.buf;
  }

  resize(width: number, height: number): void {
    this.w = width;
    this.h = height;
    this.buf = new Uint8Array(width * height);
  }

  clear(): void {
    this.buf.fill(0);
  }

  /** Regenerate the whole frame from the given stores. */
  encode(drops: Droplets, splashes: Splashes, streams: Streams, splashFrameDivisor: number): void {
    this.clear();
    this.encodeDroplets(drops);
    this.encodeSplashes(splashes, splashFrameDivisor);
    this.encodeStreams(streams);
  }

  encodeDroplets(drops: Droplets): void {
    for (let i = 0; i < drops.count; i++) {
      const x = Math.floor(drops.x[i]);
      if (x < 0 || x >= this.w) continue;
      const y = Math.floor(drops.y[i]);
      const z = drops.z[i];
      const bucket = depthBucket(z);
      const trail = trailLength(z);
      for (let k = 0; k < trail; k++) {
        this.put(x, y - k, dropletCode(bucket, Math.min(k, TRAILS - 1)));
      }
    }
  }

  encodeSplashes(splashes: Splashes, frameDivisor: number): void {
    for (let i = 0; i < splashes.count; i++) {
      const cx = Math.floor(splashes.x[i]);
      const gy = Math.floor(splashes.y[i]);
      const z = splashes.z[i];
      const bucket = depthBucket(z);
      const scale = splashScale(z);
      const phase = Math.min(PHASES - 1, Math.floor(splashes.frame[i] / frameDivisor));

      if (scale <= 0) {
        this.put(cx, gy, splashCode(bucket, TINY_GLYPHS[phase] ?? 0));
        continue;
      }

      const table = SPLASH_TABLES[splashes.type[i]];
      const quads = table?.[phase];
      if (!quads) continue;
      const drift = splashes.drift[i];
      for (let q = 0; q < quads.length; q += 4) {
        const px = cx + quads[q] * scale + quads[q + 1] * drift;
        const py = gy + quads[q + 2] * scale;
        this.put(px, py, splashCode(bucket, quads[q + 3]));
      }
    }
  }

  encodeStreams(streams: Streams): void {
    for (let i = 0; i < streams.count; i++) {
      const x = Math.floor(streams.x[i]);
      const y = Math.floor(streams.y[i]);
      this.put(x, y, streamCode(depthBucket(streams.z[i]), streamSize(streams.life[i])));
    }
  }

  /** Write a code if it beats the cell's current one; off-frame writes are dropped. */
  private put(x: number, y: number, code: number): void {
    if (x < 0 || x >= this.w || y < 0 || y >= this.h) return;
    const idx = y * this.w + x;
    if (code > this.buf[idx]) this.buf[idx] = code;
  }
}
