import { MAX_DROPS, MAX_SPLASHES, MAX_STREAMS } from "./constants.js";

export interface SimulationConfig {
  /** Droplet pool capacity. */
  maxDrops: number;
  /** Splash pool capacity. */
  maxSplashes: number;
  /** Stream pool capacity. */
  maxStreams: number;
  /** Expected droplet spawns per tick per (1 + width/64) columns. 0 disables spawning. */
  spawnRate: number;
  /** New droplets start up to this many rows above the screen. */
  spawnHeight: number;
  /** Fall speed (rows/tick) of a droplet at z = 0. */
  velNear: number;
  /** Fall speed (rows/tick) of a droplet at z = 1. */
  velFar: number;
  /** Relative random spread of the fall speed (0.2 = ±20%). */
  velJitter: number;
  /** Ground-plane fallback line, as a fraction of screen height, at z = 0. */
  groundNear: number;
  /** Ground-plane fallback line at z = 1 (the horizon). */
  groundFar: number;
  /** Probability that a ground-plane impact splashes. */
  splashChance: number;
  /** Probability that a scene-surface impact splashes. */
  surfaceSplashChance: number;
  /** Probability that a surface impact on flowing ground spawns a stream. */
  slideChance: number;
  /** Scale from |normal.x| to the chance of a directional splash. */
  tiltBias: number;
  /** Chance of a scattered (vs symmetric) splash when not directional. */
  scatterChance: number;
  /** Max distance between projected and scene depth that counts as a hit. */
  depthMargin: number;
  /** Scene depth at or below this is sky and never collides. */
  skyThreshold: number;
  /** Splash lifetime in ticks. */
  splashFrames: number;
  /** Ticks per splash animation phase. */
  splashFrameDivisor: number;
  /** Stream displacement per tick at full flow, z = 0. */
  flowSpeed: number;
  /** Stream lifetime in ticks. */
  streamLife: number;
  /** Packed flow magnitude (0–127) above which a cell counts as flowing. */
  flowThreshold: number;
  /** A stream falling off a surface only splashes while life is above this. */
  streamFallLife: number;
}

export const DEFAULT_CONFIG: SimulationConfig = {
  maxDrops: MAX_DROPS,
  maxSplashes: MAX_SPLASHES,
  maxStreams: MAX_STREAMS,
  spawnRate: 1,
  spawnHeight: 15,
  velNear: 1.7,
  velFar: 0.35,
  velJitter: 0.2,
  groundNear: 1.0,
  groundFar: 0.4,
  splashChance: 0.7,
  surfaceSplashChance: 0.9,
  slideChance: 0.6,
  tiltBias: 1.5,
  scatterChance: 0.25,
  depthMargin: 48,
  skyThreshold: 30,
  splashFrames: 24,
  splashFrameDivisor: 3,
  flowSpeed: 0.4,
  streamLife: 120,
  flowThreshold: 10,
  streamFallLife: 60,
};

type Range = readonly [min: number, max: number];

/** Accepted range per key. Out-of-range or non-finite overrides are clamped. */
export const CONFIG_RANGES: Readonly<Record<keyof SimulationConfig, Range>> = {
  maxDrops: [0, 65536],
  maxSplashes: [0, 65536],
  maxStreams: [0, 65536],
  spawnRate: [0, 100],
  spawnHeight: [0, 1000],
  velNear: [0.01, 100],
  velFar: [0.01, 100],
  velJitter: [0, 0.95],
  groundNear: [0, 2],
  groundFar: [0, 2],
  splashChance: [0, 1],
  surfaceSplashChance: [0, 1],
  slideChance: [0, 1],
  tiltBias: [0, 100],
  scatterChance: [0, 1],
  depthMargin: [0, 256],
  skyThreshold: [0, 255],
  splashFrames: [1, 255],
  splashFrameDivisor: [1, 255],
  flowSpeed: [0, 10],
  streamLife: [1, 255],
  flowThreshold: [0, 127],
  streamFallLife: [0, 255],
};

/** Every tunable, in declaration order. */
export const CONFIG_KEYS: readonly (keyof SimulationConfig)[] = [
  "maxDrops",
  "maxSplashes",
  "maxStreams",
  "spawnRate",
  "spawnHeight",
  "velNear",
  "velFar",
  "velJitter",
  "groundNear",
  "groundFar",
  "splashChance",
  "surfaceSplashChance",
  "slideChance",
  "tiltBias",
  "scatterChance",
  "depthMargin",
  "skyThreshold",
  "splashFrames",
  "splashFrameDivisor",
  "flowSpeed",
  "streamLife",
  "flowThreshold",
  "streamFallLife",
];

export const INTEGER_KEYS: ReadonlySet<keyof SimulationConfig> = new Set<keyof SimulationConfig>([
  "maxDrops",
  "maxSplashes",
  "maxStreams",
  "splashFrames",
  "splashFrameDivisor",
  "streamLife",
]);

/** Merge overrides over the defaults, clamping every value into its range. */
export function resolveConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const config: SimulationConfig = { ...DEFAULT_CONFIG };
  for (const key of CONFIG_KEYS) {
    const raw = overrides[key];
    if (raw === undefined) continue;
    config[key] = clampSetting(key, raw);
  }
  return config;
}

/** Clamp one setting into its range; NaN falls back to the default. */
export function clampSetting(key: keyof SimulationConfig, value: number): number {
  if (Number.isNaN(value)) return DEFAULT_CONFIG[key];
  const [min, max] = CONFIG_RANGES[key];
  const v = Math.min(max, Math.max(min, value));
  return INTEGER_KEYS.has(key) ? Math.floor(v) : v;
}
