import { readFileSync, writeFileSync } from "node:fs";
import { deriveSceneGrids } from "./deriveGeometry.js";
import { assertDimensions, SceneError, SceneGeometry } from "./SceneGeometry.js";

/**
 * Scene file format, version 1 (JSON, flat row-major arrays):
 *
 *   { "version": 1, "width": W, "height": H,
 *     "depth": [...], "ground": [...],
 *     "normalX": [...], "normalY": [...], "flowX": [...], "flowY": [...] }
 *
 * The four normal/flow grids are optional as a group; when absent they are
 * derived from depth + ground.
 */
export const SCENE_FILE_VERSION = 1;

const DERIVED_KEYS = ["normalX", "normalY", "flowX", "flowY"] as const;

export function parseScene(text: string): SceneGeometry {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SceneError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(raw)) {
    throw new SceneError("scene file must be a JSON object");
  }
  const doc = raw;

  if (doc.version !== SCENE_FILE_VERSION) {
    throw new SceneError(`unsupported scene version: ${String(doc.version)}`);
  }
  const width = requireNumber(doc, "width");
  const height = requireNumber(doc, "height");
  const depth = requireGrid(doc, "depth");
  const ground = requireGrid(doc, "ground");

  const present = DERIVED_KEYS.filter((k) => doc[k] !== undefined);
  if (present.length === 0) {
    assertDimensions(width, height);
    requireLength("depth", depth, width * height);
    requireLength("ground", ground, width * height);
    return new SceneGeometry(deriveSceneGrids({ width, height, depth, ground }));
  }
  if (present.length !== DERIVED_KEYS.length) {
    throw new SceneError(`normalX, normalY, flowX and flowY must be given together (got ${present.join(", ")})`);
  }
  return new SceneGeometry({
    width,
    height,
    depth,
    ground,
    normalX: requireGrid(doc, "normalX"),
    normalY: requireGrid(doc, "normalY"),
    flowX: requireGrid(doc, "flowX"),
    flowY: requireGrid(doc, "flowY"),
  });
}

export function loadSceneFile(path: string): SceneGeometry {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new SceneError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseScene(text);
}

export function serializeScene(scene: SceneGeometry): string {
  return JSON.stringify({
    version: SCENE_FILE_VERSION,
    width: scene.width,
    height: scene.height,
    depth: Array.from(scene.depth),
    ground: Array.from(scene.ground),
    normalX: Array.from(scene.normalX),
    normalY: Array.from(scene.normalY),
    flowX: Array.from(scene.flowX),
    flowY: Array.from(scene.flowY),
  });
}

export function saveSceneFile(path: string, scene: SceneGeometry): void {
  writeFileSync(path, serializeScene(scene));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function requireNumber(doc: Record<string, unknown>, key: string): number {
  const v = doc[key];
  if (typeof v !== "number") throw new SceneError(`${key} must be a number`);
  return v;
}

function requireGrid(doc: Record<string, unknown>, key: string): number[] {
  const v = doc[key];
  if (!Array.isArray(v) || !v.every((n): n is number => typeof n === "number")) {
    throw new SceneError(`${key} must be an array of numbers`);
  }
  return v;
}

function requireLength(key: string, grid: number[], area: number): void {
  if (grid.length !== area) throw new SceneError(`${key} has ${grid.length} cells, expected ${area}`);
}
