import alea from "alea";
import { createNoise2D, type NoiseFunction2D } from "simplex-noise";
import { deriveSceneGrids } from "../scene/deriveGeometry.js";
import { assertDimensions, SceneGeometry } from "../scene/SceneGeometry.js";

export interface SceneGeneratorOptions {
  /** Fraction of the height where the horizon sits on average. */
  horizon: number;
  /** Horizon wobble as a fraction of the height. */
  horizonAmplitude: number;
  /** Depth at the horizon and at the bottom edge. */
  depthFar: number;
  depthNear: number;
  /** Noise threshold above which a cell becomes a non-ground obstacle. */
  obstacleThreshold: number;
  /** Sky depth (kept below the default sky threshold). */
  skyDepth: number;
}

const DEFAULTS: SceneGeneratorOptions = {
  horizon: 0.4,
  horizonAmplitude: 0.12,
  depthFar: 60,
  depthNear: 240,
  obstacleThreshold: 0.72,
  skyDepth: 8,
};

/**
 * Procedural stand-in for a preprocessed photograph: sky above a wobbly
 * horizon, a ground plane that gets nearer toward the bottom edge, and a
 * few raised non-ground obstacles. Normals and flow are derived from depth.
 */
export class SceneGenerator {
  private readonly opts: SceneGeneratorOptions;
  private readonly horizonNoise: NoiseFunction2D;
  private readonly surfaceNoise: NoiseFunction2D;

  constructor(seed: string, options?: Partial<SceneGeneratorOptions>) {
    this.opts = { ...DEFAULTS, ...options };
    this.horizonNoise = createNoise2D(alea(`${seed}-horizon`));
    this.surfaceNoise = createNoise2D(alea(`${seed}-surface`));
  }

  generate(width: number, height: number): SceneGeometry {
    assertDimensions(width, height);
    const { horizon, horizonAmplitude, depthFar, depthNear, obstacleThreshold, skyDepth } = this.opts;
    const area = width * height;
    const depth = new Uint8Array(area);
    const ground = new Uint8Array(area);

    for (let x = 0; x < width; x++) {
      const wobble = this.horizonNoise(x * 0.03, 0) * horizonAmplitude;
      const horizonRow = Math.round(height * Math.min(0.95, Math.max(0.05, horizon + wobble)));
      for (let y = 0; y < height; y++) {
        const i = y * width + x;
        if (y < horizonRow) {
          depth[i] = skyDepth;
          continue;
        }
        const t = height - horizonRow <= 1 ? 1 : (y - horizonRow) / (height - horizonRow - 1);
        const bumps = this.surfaceNoise(x * 0.08, y * 0.08);
        let d = depthFar + (depthNear - depthFar) * t + bumps * 8;
        const obstacle = (bumps + 1) / 2 > obstacleThreshold;
        if (obstacle) d += 20;
        depth[i] = Math.round(Math.min(255, Math.max(0, d)));
        ground[i] = obstacle ? 0 : 1;
      }
    }

    return new SceneGeometry(deriveSceneGrids({ width, height, depth, ground }));
  }
}
