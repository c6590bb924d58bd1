import { BUCKETS, DEPTH_MAX } from "../config/constants.js";

/** z ∈ [0,1] → depth bucket, near (z = 0) maps to BUCKETS - 1. */
export function depthBucket(z: number): number {
  const b = Math.floor((1 - z) * BUCKETS);
  if (b < 0) return 0;
  if (b > BUCKETS - 1) return BUCKETS - 1;
  return b;
}

/** z → the scene depth value (0–255 scale) a droplet at that z would match. */
export function projectedDepth(z: number): number {
  return (1 - z) * DEPTH_MAX;
}

/**
 * Collision rule: the droplet's projected depth lies within `margin` of the
 * scene depth, and the scene there is not sky.
 */
export function depthMatches(sceneDepth: number, z: number, margin: number, skyThreshold: number): boolean {
  if (sceneDepth <= skyThreshold) return false;
  return Math.abs(projectedDepth(z) - sceneDepth) < margin;
}

/** Clamp to [0,1]; NaN becomes 1 (farthest). */
export function clampUnit(v: number): number {
  if (Number.isNaN(v)) return 1;
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}
