import { assertDimensions, SceneGeometry } from "./SceneGeometry.js";

export interface SceneCell {
  depth: number;
  ground: boolean;
  normalX?: number;
  normalY?: number;
  flowX?: number;
  flowY?: number;
}

/** Build a scene cell by cell. Packed normal/flow values default to 0. */
export function buildScene(
  width: number,
  height: number,
  cellAt: (x: number, y: number) => SceneCell,
): SceneGeometry {
  assertDimensions(width, height);
  const area = width * height;
  const depth = new Array<number>(area);
  const ground = new Array<number>(area);
  const normalX = new Array<number>(area);
  const normalY = new Array<number>(area);
  const flowX = new Array<number>(area);
  const flowY = new Array<number>(area);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const c = cellAt(x, y);
      depth[i] = c.depth;
      ground[i] = c.ground ? 1 : 0;
      normalX[i] = c.normalX ?? 0;
      normalY[i] = c.normalY ?? 0;
      flowX[i] = c.flowX ?? 0;
      flowY[i] = c.flowY ?? 0;
    }
  }
  return new SceneGeometry({ width, height, depth, ground, normalX, normalY, flowX, flowY });
}
