/**
 * Frame cell codes, the contract between the simulation and the renderer.
 *
 *   0                          empty
 *   1  .. 32                   droplet: bucket = (v-1)/4,  trail = (v-1)%4
 *   33 .. 96                   splash:  bucket = (v-33)/8, glyph = (v-33)%8
 *   97 .. 128                  stream:  bucket = (v-97)/4, size  = (v-97)%4
 *
 * Bucket 7 is nearest. Trail 0 is the droplet head. Stream size 3 is the
 * freshest. See FRAME_FORMAT_VERSION.
 */

import {
  CODE_END,
  DROPLET_BASE,
  SPLASH_BASE,
  SPLASH_CHARS,
  STREAM_BASE,
  STREAM_SIZES,
  TRAILS,
} from "../config/constants.js";

export enum SplashGlyph {
  Center = 0,
  Spike = 1,
  Droplet = 2,
  /** Reserved. */
  Mist = 3,
  LeftWing = 4,
  RightWing = 5,
  Fade = 6,
  /** Reserved. */
  Ripple = 7,
}

export type CellKind = "empty" | "droplet" | "splash" | "stream" | "invalid";

export interface DecodedCell {
  kind: CellKind;
  /** Depth bucket, -1 for empty/invalid. */
  bucket: number;
  /** Trail position, splash glyph or stream size; -1 for empty/invalid. */
  variant: number;
}

export function dropletCode(bucket: number, trail: number): number {
  return DROPLET_BASE + bucket * TRAILS + trail;
}

export function splashCode(bucket: number, glyph: number): number {
  return SPLASH_BASE + bucket * SPLASH_CHARS + glyph;
}

export function streamCode(bucket: number, size: number): number {
  return STREAM_BASE + bucket * STREAM_SIZES + size;
}

export function decodeCell(v: number, out: DecodedCell = { kind: "empty", bucket: -1, variant: -1 }): DecodedCell {
  if (v === 0) return set(out, "empty", -1, -1);
  if (v >= DROPLET_BASE && v < SPLASH_BASE) {
    const r = v - DROPLET_BASE;
    return set(out, "droplet", Math.floor(r / TRAILS), r % TRAILS);
  }
  if (v >= SPLASH_BASE && v < STREAM_BASE) {
    const r = v - SPLASH_BASE;
    return set(out, "splash", Math.floor(r / SPLASH_CHARS), r % SPLASH_CHARS);
  }
  if (v >= STREAM_BASE && v < CODE_END) {
    const r = v - STREAM_BASE;
    return set(out, "stream", Math.floor(r / STREAM_SIZES), r % STREAM_SIZES);
  }
  return set(out, "invalid", -1, -1);
}

function set(out: DecodedCell, kind: CellKind, bucket: number, variant: number): DecodedCell {
  out.kind = kind;
  out.bucket = bucket;
  out.variant = variant;
  return out;
}
