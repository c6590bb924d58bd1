export * from "./config/constants.js";
export {
  CONFIG_RANGES,
  DEFAULT_CONFIG,
  resolveConfig,
  type SimulationConfig,
} from "./config/SimulationConfig.js";
export { CVar, type CVarDesc } from "./console/CVar.js";
export { CVarRegistry } from "./console/CVarRegistry.js";
export { configFromCVars, registerSimCVars } from "./console/simCVarDefs.js";
export { SceneGenerator, type SceneGeneratorOptions } from "./generation/SceneGenerator.js";
export { type FrameView, RainWorld, type RainWorldOptions } from "./host/RainWorld.js";
export { TickLoop } from "./host/TickLoop.js";
export { type CellKind, type DecodedCell, decodeCell, SplashGlyph } from "./render/cellCodes.js";
export { FrameEncoder } from "./render/FrameEncoder.js";
export { renderText } from "./render/textPreview.js";
export { buildScene, type SceneCell } from "./scene/buildScene.js";
export { deriveSceneGrids } from "./scene/deriveGeometry.js";
export { loadSceneFile, parseScene, SCENE_FILE_VERSION, saveSceneFile, serializeScene } from "./scene/sceneFile.js";
export { SceneError, SceneGeometry, type SceneGrids } from "./scene/SceneGeometry.js";
export { RainSimulation, type RainSimulationOptions, type SimulationStats } from "./sim/RainSimulation.js";
export { SplashType } from "./sim/Splashes.js";
export { type Vec2, WorldQuery } from "./world/WorldQuery.js";
