import { PACKED_UNIT } from "../config/constants.js";
import type { SceneGeometry } from "../scene/SceneGeometry.js";
import { depthMatches } from "../sim/depth.js";

export interface Vec2 {
  x: number;
  y: number;
}

export interface WorldQueryOptions {
  depthMargin: number;
  skyThreshold: number;
  flowThreshold: number;
}

/**
 * Screen-space lookups into the scene maps.
 *
 * Screen coordinates are scaled into background space with factors fixed by
 * setScreenSize(), then floored to a cell. Anything outside the scene reads
 * as sky: depth 0, not ground, zero flow, zero normal. Vector results are
 * written into a caller-owned Vec2 so per-entity queries never allocate.
 */
export class WorldQuery {
  readonly scene: SceneGeometry;
  private readonly opts: WorldQueryOptions;
  private scaleX = 0;
  private scaleY = 0;

  constructor(scene: SceneGeometry, opts: WorldQueryOptions) {
    this.scene = scene;
    this.opts = opts;
  }

  setScreenSize(width: number, height: number): void {
    this.scaleX = width > 0 ? this.scene.width / width : 0;
    this.scaleY = height > 0 ? this.scene.height / height : 0;
  }

  /** Background cell index for a screen position, or -1. */
  cellAt(x: number, y: number): number {
    if (this.scaleX === 0 || this.scaleY === 0) return -1;
    return this.scene.indexOf(Math.floor(x * this.scaleX), Math.floor(y * this.scaleY));
  }

  depthAt(x: number, y: number): number {
    const i = this.cellAt(x, y);
    return i < 0 ? 0 : this.scene.depth[i];
  }

  isGround(x: number, y: number): boolean {
    const i = this.cellAt(x, y);
    return i >= 0 && this.scene.ground[i] === 1;
  }

  /** Flow in [-1, 1] per axis; zero off-ground even if the map says otherwise. */
  flowAt(x: number, y: number, out: Vec2): Vec2 {
    const i = this.cellAt(x, y);
    if (i < 0 || this.scene.ground[i] !== 1) {
      out.x = 0;
      out.y = 0;
    } else {
      out.x = this.scene.flowX[i] / PACKED_UNIT;
      out.y = this.scene.flowY[i] / PACKED_UNIT;
    }
    return out;
  }

  normalAt(x: number, y: number, out: Vec2): Vec2 {
    const i = this.cellAt(x, y);
    if (i < 0) {
      out.x = 0;
      out.y = 0;
    } else {
      out.x = this.scene.normalX[i] / PACKED_UNIT;
      out.y = this.scene.normalY[i] / PACKED_UNIT;
    }
    return out;
  }

  /** Ground with a packed flow component beyond the threshold (not a sink). */
  hasFlow(x: number, y: number): boolean {
    const i = this.cellAt(x, y);
    if (i < 0 || this.scene.ground[i] !== 1) return false;
    const t = this.opts.flowThreshold;
    return Math.abs(this.scene.flowX[i]) > t || Math.abs(this.scene.flowY[i]) > t;
  }

  /** Flow magnitude in [0, 1]. */
  flowStrength(x: number, y: number): number {
    const i = this.cellAt(x, y);
    if (i < 0 || this.scene.ground[i] !== 1) return 0;
    const fx = this.scene.flowX[i];
    const fy = this.scene.flowY[i];
    return Math.min(1, Math.sqrt(fx * fx + fy * fy) / PACKED_UNIT);
  }

  /** True when a droplet at depth z meets the scene surface here. */
  hitsSurface(x: number, y: number, z: number): boolean {
    const i = this.cellAt(x, y);
    if (i < 0) return false;
    return depthMatches(this.scene.depth[i], z, this.opts.depthMargin, this.opts.skyThreshold);
  }
}
