import { MAX_DRIFT } from "../config/constants.js";
import { lerp } from "./depth.js";
import type { Rng } from "./rng.js";
import { SplashType } from "./Splashes.js";

const SPLASH_TYPES: readonly SplashType[] = [
  SplashType.Symmetric,
  SplashType.LeftBiased,
  SplashType.RightBiased,
  SplashType.Scattered,
];

export interface SplashChoice {
  type: SplashType;
  drift: number;
}

export interface SplashBias {
  tiltBias: number;
  scatterChance: number;
}

/**
 * Pick splash type and drift from the surface normal's horizontal component.
 * The steeper the tilt, the likelier a burst to the side the surface faces;
 * drift leans the same way. Writes into `out`.
 */
export function chooseSplash(normalX: number, rng: Rng, bias: SplashBias, out: SplashChoice): SplashChoice {
  const tilt = Math.min(1, Math.abs(normalX));
  const directional = Math.min(1, tilt * bias.tiltBias);
  if (rng() < directional) {
    out.type = normalX < 0 ? SplashType.LeftBiased : SplashType.RightBiased;
  } else if (rng() < bias.scatterChance) {
    out.type = SplashType.Scattered;
  } else {
    out.type = SplashType.Symmetric;
  }
  const lean = normalX * MAX_DRIFT + (rng() - 0.5) * 2;
  out.drift = Math.max(-MAX_DRIFT, Math.min(MAX_DRIFT, Math.round(lean)));
  return out;
}

/** Splash for a ground-plane impact: any type, drift uniform in ±MAX_DRIFT. */
export function randomSplash(rng: Rng, out: SplashChoice): SplashChoice {
  out.type = SPLASH_TYPES[Math.floor(rng() * SPLASH_TYPES.length)] ?? SplashType.Symmetric;
  out.drift = Math.floor(rng() * (MAX_DRIFT * 2 + 1)) - MAX_DRIFT;
  return out;
}

export interface GroundPlane {
  groundNear: number;
  groundFar: number;
}

/** Screen row of the perspective ground plane for depth z. */
export function groundLine(height: number, z: number, plane: GroundPlane): number {
  return height * lerp(plane.groundNear, plane.groundFar, z);
}
