import { DEPTH_MAX, PACKED_UNIT } from "../config/constants.js";
import type { SceneGrids } from "./SceneGeometry.js";

export interface DepthGrids {
  width: number;
  height: number;
  depth: ArrayLike<number>;
  ground: ArrayLike<number>;
}

/** Depth-to-slope scale used for normals. */
const NORMAL_SCALE = 50;

/** Gradient sample offsets and weights for the flow field (fine, medium, coarse). */
const FLOW_SCALES: readonly (readonly [offset: number, weight: number])[] = [
  [2, 0.25],
  [5, 0.4],
  [10, 0.35],
];

/** Water prefers running sideways along slopes. */
const HORIZONTAL_BOOST = 2.5;
/** Constant pull toward the viewer (increasing depth). */
const GRAVITY_BIAS = 0.02;
/** Packed downward flow on perfectly flat ground. */
const FLAT_FLOW_Y = 51;

/**
 * Compute normals and flow from depth + ground, for scenes that ship only
 * those two maps. Samples beyond the border repeat the edge cell.
 */
export function deriveSceneGrids(src: DepthGrids): SceneGrids {
  const { width, height, depth, ground } = src;
  const area = width * height;
  const normalX = new Int8Array(area);
  const normalY = new Int8Array(area);
  const flowX = new Int8Array(area);
  const flowY = new Int8Array(area);

  const d = (x: number, y: number): number => {
    const cx = Math.min(width - 1, Math.max(0, x));
    const cy = Math.min(height - 1, Math.max(0, y));
    return (depth[cy * width + cx] ?? 0) / DEPTH_MAX;
  };

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;

      const dzdx = (d(x + 1, y) - d(x - 1, y)) * NORMAL_SCALE;
      const dzdy = (d(x, y + 1) - d(x, y - 1)) * NORMAL_SCALE;
      const len = Math.sqrt(dzdx * dzdx + dzdy * dzdy + 1);
      normalX[i] = pack(-dzdx / len);
      normalY[i] = pack(-dzdy / len);

      if (ground[i] !== 1) continue;

      let gx = 0;
      let gy = 0;
      for (const [o, w] of FLOW_SCALES) {
        gx += (d(x + o, y) - d(x - o, y)) * w * HORIZONTAL_BOOST;
        gy += (d(x, y + o) - d(x, y - o)) * w;
      }
      gy += GRAVITY_BIAS;

      const flowLen = Math.sqrt(gx * gx + gy * gy);
      if (flowLen > 0.001) {
        const strength = Math.min(1, flowLen * 8 + 0.4);
        flowX[i] = pack((gx / flowLen) * strength);
        flowY[i] = pack((gy / flowLen) * strength);
      } else {
        flowY[i] = FLAT_FLOW_Y;
      }
    }
  }

  return { width, height, depth, ground, normalX, normalY, flowX, flowY };
}

/** [-1, 1] → packed i8, truncating toward zero. */
function pack(v: number): number {
  return Math.trunc(Math.max(-PACKED_UNIT, Math.min(PACKED_UNIT, v * PACKED_UNIT)));
}
