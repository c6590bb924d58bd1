import { TICK_RATE } from "../config/constants.js";
import {
  CONFIG_KEYS,
  CONFIG_RANGES,
  DEFAULT_CONFIG,
  INTEGER_KEYS,
  type SimulationConfig,
} from "../config/SimulationConfig.js";
import type { CVarDesc } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";

const DESCRIPTIONS: Readonly<Record<keyof SimulationConfig, string>> = {
  maxDrops: "Droplet pool capacity",
  maxSplashes: "Splash pool capacity",
  maxStreams: "Stream pool capacity",
  spawnRate: "Droplet spawn rate multiplier (0 = no rain)",
  spawnHeight: "Rows above the screen where droplets may start",
  velNear: "Fall speed of the nearest droplets (rows/tick)",
  velFar: "Fall speed of the farthest droplets (rows/tick)",
  velJitter: "Random fall speed spread (fraction)",
  groundNear: "Ground-plane line for near droplets (fraction of height)",
  groundFar: "Ground-plane line for far droplets (fraction of height)",
  splashChance: "Splash probability on a ground-plane hit",
  surfaceSplashChance: "Splash probability on a scene surface hit",
  slideChance: "Stream probability on a flowing surface hit",
  tiltBias: "How strongly surface tilt favours directional splashes",
  scatterChance: "Scattered splash probability on flat surfaces",
  depthMargin: "Depth tolerance for a surface hit (0-255 units)",
  skyThreshold: "Scene depth at or below which nothing collides",
  splashFrames: "Splash lifetime (ticks)",
  splashFrameDivisor: "Ticks per splash animation phase",
  flowSpeed: "Stream speed along the flow field",
  streamLife: "Stream lifetime (ticks)",
  flowThreshold: "Packed flow magnitude that counts as flowing",
  streamFallLife: "Minimum remaining life for a falling stream to splash",
};

/** Simulation tunables as CVar descriptors, one per SimulationConfig key. */
export const SIM_CVAR_DEFS: readonly CVarDesc[] = CONFIG_KEYS.map((key): CVarDesc => {
  const [min, max] = CONFIG_RANGES[key];
  return {
    name: key,
    description: DESCRIPTIONS[key],
    defaultValue: DEFAULT_CONFIG[key],
    min,
    max,
    integer: INTEGER_KEYS.has(key),
    category: "sim",
  };
});

export const HOST_CVAR_DEFS: readonly CVarDesc[] = [
  {
    name: "host_tickrate",
    description: "Host tick rate (Hz)",
    defaultValue: TICK_RATE,
    min: 1,
    max: 240,
    category: "host",
  },
];

export function registerSimCVars(registry: CVarRegistry): void {
  for (const def of SIM_CVAR_DEFS) registry.register(def);
  for (const def of HOST_CVAR_DEFS) registry.register(def);
}

/** Collect every simulation CVar that differs from its default. */
export function configFromCVars(registry: CVarRegistry): Partial<SimulationConfig> {
  const overrides: Partial<SimulationConfig> = {};
  for (const key of CONFIG_KEYS) {
    const cv = registry.get(key);
    if (cv && cv.get() !== cv.defaultValue) overrides[key] = cv.get();
  }
  return overrides;
}
