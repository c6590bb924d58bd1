/** Thrown when scene data breaks the construction contract. */
export class SceneError extends Error {
  constructor(message: string) {
    super(`[scene] ${message}`);
    this.name = "SceneError";
  }
}

/** Raw grids, row-major, each `width * height` long. */
export interface SceneGrids {
  width: number;
  height: number;
  /** 0 = far/sky, 255 = near. */
  depth: ArrayLike<number>;
  /** 0 or 1. */
  ground: ArrayLike<number>;
  /** Packed signed normal components, 127 = 1.0. */
  normalX: ArrayLike<number>;
  normalY: ArrayLike<number>;
  /** Packed signed flow components, 127 = 1.0. */
  flowX: ArrayLike<number>;
  flowY: ArrayLike<number>;
}

/**
 * Immutable scene maps produced offline from a source photograph.
 * Construction validates shape and ranges; after that every read is
 * unchecked typed-array access.
 */
export class SceneGeometry {
  readonly width: number;
  readonly height: number;
  readonly depth: Uint8Array;
  readonly ground: Uint8Array;
  readonly normalX: Int8Array;
  readonly normalY: Int8Array;
  readonly flowX: Int8Array;
  readonly flowY: Int8Array;

  constructor(grids: SceneGrids) {
    const { width, height } = grids;
    assertDimensions(width, height);
    const area = width * height;
    this.width = width;
    this.height = height;
    this.depth = copyGrid("depth", grids.depth, area, 0, 255, Uint8Array);
    this.ground = copyGrid("ground", grids.ground, area, 0, 1, Uint8Array);
    this.normalX = copyGrid("normalX", grids.normalX, area, -128, 127, Int8Array);
    this.normalY = copyGrid("normalY", grids.normalY, area, -128, 127, Int8Array);
    this.flowX = copyGrid("flowX", grids.flowX, area, -128, 127, Int8Array);
    this.flowY = copyGrid("flowY", grids.flowY, area, -128, 127, Int8Array);
  }

  /** Row-major index, or -1 outside the grid. */
  indexOf(bx: number, by: number): number {
    if (!(bx >= 0 && bx < this.width && by >= 0 && by < this.height)) return -1;
    return by * this.width + bx;
  }
}

export function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
    throw new SceneError(`dimensions must be positive integers, got ${width}x${height}`);
  }
}

function copyGrid<T extends Uint8Array | Int8Array>(
  name: string,
  src: ArrayLike<number>,
  area: number,
  min: number,
  max: number,
  Ctor: new (length: number) => T,
): T {
  if (src.length !== area) {
    throw new SceneError(`${name} has ${src.length} cells, expected ${area}`);
  }
  const out = new Ctor(area);
  for (let i = 0; i < area; i++) {
    const v = src[i];
    if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
      throw new SceneError(`${name}[${i}] = ${String(v)} is outside ${min}..${max}`);
    }
    out[i] = v;
  }
  return out;
}
