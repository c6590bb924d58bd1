import { SPAWN_COLUMNS_PER_DROP } from "../config/constants.js";
import { resolveConfig, type SimulationConfig } from "../config/SimulationConfig.js";
import { FrameEncoder } from "../render/FrameEncoder.js";
import type { SceneGeometry } from "../scene/SceneGeometry.js";
import { type Vec2, WorldQuery } from "../world/WorldQuery.js";
import { chooseSplash, groundLine, randomSplash, type SplashChoice } from "./collision.js";
import { lerp } from "./depth.js";
import { Droplets } from "./Droplets.js";
import { createRng, type Rng } from "./rng.js";
import { Splashes, SplashType } from "./Splashes.js";
import { Streams } from "./Streams.js";

export interface RainSimulationOptions {
  config?: Partial<SimulationConfig>;
  seed?: string | number;
}

export interface SimulationStats {
  ticks: number;
  /** Droplets inserted by the spawner. */
  spawned: number;
  /** Spawns refused by a full pool, across all three stores. */
  droppedSpawns: number;
  /** Droplets that left the screen. */
  exits: number;
  surfaceHits: number;
  groundHits: number;
  splashesSpawned: number;
  streamsSpawned: number;
}

export const DEFAULT_SEED = "rainfield";

/** Horizontal scatter applied to every splash origin, in cells either way. */
const SPLASH_JITTER = 2;

export function assertScreenSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`screen size must be non-negative integers, got ${width}x${height}`);
  }
}

function emptyStats(): SimulationStats {
  return {
    ticks: 0,
    spawned: 0,
    droppedSpawns: 0,
    exits: 0,
    surfaceHits: 0,
    groundHits: 0,
    splashesSpawned: 0,
    streamsSpawned: 0,
  };
}

/**
 * Rain over a static scene.
 *
 * Owns the three entity stores, the PRNG and the frame encoder. Each tick
 * spawns droplets along the top edge, integrates and collides them against
 * the scene, ages splashes, slides streams along the flow field, then
 * re-encodes the whole frame.
 */
export class RainSimulation {
  readonly config: SimulationConfig;
  readonly drops: Droplets;
  readonly splashes: Splashes;
  readonly streams: Streams;
  readonly world: WorldQuery;
  readonly stats: SimulationStats = emptyStats();

  private readonly encoder: FrameEncoder;
  private readonly rng: Rng;
  private w: number;
  private h: number;

  // Scratch, reused across ticks
  private readonly vec: Vec2 = { x: 0, y: 0 };
  private readonly choice: SplashChoice = { type: SplashType.Symmetric, drift: 0 };

  constructor(scene: SceneGeometry, width: number, height: number, options: RainSimulationOptions = {}) {
    assertScreenSize(width, height);
    this.config = resolveConfig(options.config);
    this.rng = createRng(options.seed ?? DEFAULT_SEED);
    this.drops = new Droplets(this.config.maxDrops, this.config);
    this.splashes = new Splashes(this.config.maxSplashes);
    this.streams = new Streams(this.config.maxStreams);
    this.world = new WorldQuery(scene, this.config);
    this.world.setScreenSize(width, height);
    this.encoder = new FrameEncoder(width, height);
    this.w = width;
    this.h = height;
  }

  get width(): number {
    return this.w;
  }

  get height(): number {
    return this.h;
  }

  get buffer(): Uint8Array {
    return this.encoder.buffer;
  }

  get liveCount(): number {
    return this.drops.count + this.splashes.count + this.streams.count;
  }

  /** Change the screen size. Every entity is discarded and the frame is reallocated. */
  resize(width: number, height: number): void {
    assertScreenSize(width, height);
    this.w = width;
    this.h = height;
    this.world.setScreenSize(width, height);
    this.encoder.resize(width, height);
    this.drops.clear();
    this.splashes.clear();
    this.streams.clear();
  }

  tick(): void {
    if (this.w === 0 || this.h === 0) return;
    this.stats.ticks++;
    this.spawnDroplets();
    this.stepDroplets();
    this.splashes.advance(this.config.splashFrames);
    this.stepStreams();
    this.encode();
  }

  /** Rewrite the frame from current entity state. */
  encode(): void {
    this.encoder.encode(this.drops, this.splashes, this.streams, this.config.splashFrameDivisor);
  }

  private spawnDroplets(): void {
    const cfg = this.config;
    const expected = cfg.spawnRate * (1 + this.w / SPAWN_COLUMNS_PER_DROP);
    let count = Math.floor(expected);
    if (this.rng() < expected - count) count++;

    for (let k = 0; k < count; k++) {
      const z = this.rng();
      const x = this.rng() * this.w;
      const y = -this.rng() * cfg.spawnHeight;
      const jitter = 1 - cfg.velJitter + this.rng() * 2 * cfg.velJitter;
      const v = lerp(cfg.velNear, cfg.velFar, z) * jitter;
      if (this.drops.spawn({ x, y, z, v }) < 0) {
        this.stats.droppedSpawns++;
      } else {
        this.stats.spawned++;
      }
    }
  }

  private stepDroplets(): void {
    const { drops, world, config: cfg } = this;
    const w = this.w;
    const h = this.h;

    for (let i = 0; i < drops.count; ) {
      const x = drops.x[i];
      const prevY = drops.y[i];
      const y = prevY + drops.v[i];
      const z = drops.z[i];
      drops.y[i] = y;

      if (x < 0 || x >= w) {
        drops.remove(i);
        this.stats.exits++;
        continue;
      }

      const hitRow = this.firstHitRow(x, prevY, y, z);
      if (hitRow >= 0) {
        drops.remove(i);
        this.stats.surfaceHits++;
        this.surfaceImpact(x, hitRow, z);
        continue;
      }

      if (y >= h) {
        drops.remove(i);
        this.stats.exits++;
        continue;
      }

      const line = groundLine(h, z, cfg);
      if (y > line && world.isGround(x, line)) {
        drops.remove(i);
        this.stats.groundHits++;
        if (this.rng() < cfg.splashChance) {
          randomSplash(this.rng, this.choice);
          this.spawnSplash(x, line, z, this.choice.type, this.choice.drift);
        }
        continue;
      }

      i++;
    }
  }

  /** First row entered on the way from `fromY` to `toY` whose surface stops a droplet at depth `z`, or -1. */
  private firstHitRow(x: number, fromY: number, toY: number, z: number): number {
    const last = Math.min(Math.floor(toY), this.h - 1);
    for (let row = Math.max(0, Math.floor(fromY) + 1); row <= last; row++) {
      if (this.world.hitsSurface(x, row, z)) return row;
    }
    return -1;
  }

  private surfaceImpact(x: number, y: number, z: number): void {
    const cfg = this.config;
    if (this.world.hasFlow(x, y) && this.rng() < cfg.slideChance) {
      if (this.streams.spawn({ x, y, z, life: cfg.streamLife }) < 0) {
        this.stats.droppedSpawns++;
      } else {
        this.stats.streamsSpawned++;
      }
    }
    if (this.rng() < cfg.surfaceSplashChance) {
      this.world.normalAt(x, y, this.vec);
      chooseSplash(this.vec.x, this.rng, cfg, this.choice);
      this.spawnSplash(x, y, z, this.choice.type, this.choice.drift);
    }
  }

  private stepStreams(): void {
    const { streams, world, config: cfg, vec } = this;
    const w = this.w;
    const h = this.h;

    for (let i = 0; i < streams.count; ) {
      const life = streams.life[i];
      if (life === 0) {
        streams.remove(i);
        continue;
      }

      const z = streams.z[i];
      world.flowAt(streams.x[i], streams.y[i], vec);
      const speed = cfg.flowSpeed * (1 - z * 0.5);
      const x = streams.x[i] + vec.x * speed;
      const y = streams.y[i] + vec.y * speed;

      if (x < 0 || x >= w || y < 0 || y >= h) {
        streams.remove(i);
        continue;
      }

      // Ran off the ground or off the surface band: the water drips off.
      if (!world.isGround(x, y) || !world.hitsSurface(x, y, z)) {
        streams.remove(i);
        if (life > cfg.streamFallLife) {
          this.spawnSplash(x, y, z, SplashType.RightBiased, this.randomDrift());
        }
        continue;
      }

      // Pooled.
      if (!world.hasFlow(x, y)) {
        streams.remove(i);
        this.spawnSplash(x, y, z, SplashType.Symmetric, this.randomDrift());
        continue;
      }

      streams.x[i] = x;
      streams.y[i] = y;
      streams.life[i] = life - 1;
      i++;
    }
  }

  private randomDrift(): number {
    return randomSplash(this.rng, this.choice).drift;
  }

  private spawnSplash(x: number, y: number, z: number, type: SplashType, drift: number): void {
    const jx = x + (this.rng() - 0.5) * 2 * SPLASH_JITTER;
    if (this.splashes.spawn({ x: jx, y, z, type, drift }) < 0) {
      this.stats.droppedSpawns++;
    } else {
      this.stats.splashesSpawned++;
    }
  }
}
