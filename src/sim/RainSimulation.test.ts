import { describe, expect, it } from "vitest";
import type { SimulationConfig } from "../config/SimulationConfig.js";
import { SceneGenerator } from "../generation/SceneGenerator.js";
import { buildScene } from "../scene/buildScene.js";
import type { SceneGeometry } from "../scene/SceneGeometry.js";
import { RainSimulation } from "./RainSimulation.js";
import { SplashType } from "./Splashes.js";

/** Depth whose projected droplet depth is exactly 200. */
const Z_200 = 55 / 255;

function skyScene(): SceneGeometry {
  return buildScene(10, 10, () => ({ depth: 10, ground: false }));
}

/** Row 5 is ground at depth 200; everything else is sky. */
function ledgeScene(): SceneGeometry {
  return buildScene(10, 10, (_x, y) => (y === 5 ? { depth: 200, ground: true } : { depth: 10, ground: false }));
}

function quiet(scene: SceneGeometry, config: Partial<SimulationConfig> = {}): RainSimulation {
  return new RainSimulation(scene, 10, 10, { seed: "test", config: { spawnRate: 0, ...config } });
}

describe("RainSimulation construction", () => {
  it("rejects negative and fractional screen sizes", () => {
    expect(() => new RainSimulation(skyScene(), -1, 10)).toThrow(RangeError);
    expect(() => new RainSimulation(skyScene(), 10, 2.5)).toThrow(RangeError);
    const sim = quiet(skyScene());
    expect(() => sim.resize(4, -3)).toThrow(RangeError);
    expect(sim.width).toBe(10);
  });

  it("treats a zero-area screen as a no-op", () => {
    const sim = new RainSimulation(skyScene(), 0, 10, { seed: "test" });
    for (let k = 0; k < 10; k++) sim.tick();
    expect(sim.buffer.length).toBe(0);
    expect(sim.liveCount).toBe(0);
    expect(sim.stats.ticks).toBe(0);
  });
});

describe("RainSimulation pools", () => {
  it("never holds more droplets than capacity", () => {
    const sim = new RainSimulation(skyScene(), 10, 10, {
      seed: "cap",
      config: { maxDrops: 50, spawnRate: 100 },
    });
    sim.tick();
    expect(sim.drops.count).toBe(50);
    expect(sim.stats.spawned).toBe(50);
    expect(sim.stats.droppedSpawns).toBeGreaterThanOrEqual(65);
    for (let k = 0; k < 100; k++) {
      sim.tick();
      expect(sim.drops.count).toBeLessThanOrEqual(50);
    }
  });

  it("caps splashes and streams on an all-ground flowing scene", () => {
    const scene = buildScene(10, 10, () => ({ depth: 200, ground: true, flowX: 127 }));
    const sim = new RainSimulation(scene, 10, 10, {
      seed: "flood",
      config: { spawnRate: 100, maxSplashes: 5, maxStreams: 5 },
    });
    for (let k = 0; k < 200; k++) {
      sim.tick();
      expect(sim.splashes.count).toBeLessThanOrEqual(5);
      expect(sim.streams.count).toBeLessThanOrEqual(5);
    }
    expect(sim.stats.surfaceHits).toBeGreaterThan(0);
    expect(sim.stats.droppedSpawns).toBeGreaterThan(0);
  });

  it("keeps every live droplet and stream on screen", () => {
    const scene = new SceneGenerator("compact").generate(64, 32);
    const sim = new RainSimulation(scene, 80, 24, { seed: "compact" });
    for (let k = 0; k < 300; k++) sim.tick();
    expect(sim.stats.surfaceHits + sim.stats.exits).toBeGreaterThan(0);
    for (let i = 0; i < sim.drops.count; i++) {
      expect(sim.drops.x[i]).toBeGreaterThanOrEqual(0);
      expect(sim.drops.x[i]).toBeLessThan(80);
      expect(sim.drops.y[i]).toBeLessThan(24);
    }
    for (let i = 0; i < sim.streams.count; i++) {
      expect(sim.streams.x[i]).toBeGreaterThanOrEqual(0);
      expect(sim.streams.x[i]).toBeLessThan(80);
      expect(sim.streams.y[i]).toBeGreaterThanOrEqual(0);
      expect(sim.streams.y[i]).toBeLessThan(24);
    }
  });
});

describe("RainSimulation droplets", () => {
  it("removes droplets that fall past the bottom or start off the sides", () => {
    const sim = quiet(skyScene());
    sim.drops.spawn({ x: 3, y: 9.5, z: 0.5, v: 1 });
    sim.drops.spawn({ x: -1, y: 0, z: 0.5, v: 1 });
    sim.tick();
    expect(sim.drops.count).toBe(0);
    expect(sim.stats.exits).toBe(2);
  });

  it("lets a droplet at the wrong depth pass a surface", () => {
    const sim = quiet(ledgeScene(), { surfaceSplashChance: 1 });
    sim.drops.spawn({ x: 3.5, y: 4, z: 0.9, v: 1 });
    sim.tick();
    expect(sim.drops.count).toBe(1);
    expect(sim.drops.y[0]).toBe(5);
    expect(sim.splashes.count).toBe(0);
  });

  it("splashes on the ground-plane line where the scene is ground", () => {
    const scene = buildScene(10, 10, () => ({ depth: 10, ground: true }));
    const sim = quiet(scene, { splashChance: 1 });
    sim.drops.spawn({ x: 3.5, y: 6.5, z: 0.5, v: 1 });
    sim.tick();
    expect(sim.drops.count).toBe(0);
    expect(sim.stats.groundHits).toBe(1);
    expect(sim.stats.surfaceHits).toBe(0);
    expect(sim.splashes.count).toBe(1);
    expect(sim.splashes.y[0]).toBeCloseTo(7, 5);
  });

  it("spawns a stream on flowing ground", () => {
    const scene = buildScene(10, 10, () => ({ depth: 200, ground: true, flowX: 127 }));
    const sim = quiet(scene, { slideChance: 1, surfaceSplashChance: 0 });
    sim.drops.spawn({ x: 2.5, y: 4, z: Z_200, v: 1 });
    sim.tick();
    expect(sim.stats.surfaceHits).toBe(1);
    expect(sim.stats.streamsSpawned).toBe(1);
    expect(sim.splashes.count).toBe(0);
    expect(sim.streams.count).toBe(1);
    expect(sim.streams.life[0]).toBe(119);
    expect(sim.streams.x[0]).toBeGreaterThan(2.5);
    expect(sim.streams.y[0]).toBe(5);
  });
});

describe("RainSimulation streams", () => {
  function streamAt(scene: SceneGeometry, config: Partial<SimulationConfig> = {}): RainSimulation {
    const sim = quiet(scene, { slideChance: 1, surfaceSplashChance: 0, ...config });
    sim.drops.spawn({ x: 2.5, y: 4, z: Z_200, v: 1 });
    return sim;
  }

  it("runs off the edge of the screen without splashing", () => {
    const sim = streamAt(buildScene(10, 10, () => ({ depth: 200, ground: true, flowX: 127 })));
    for (let k = 0; k < 40; k++) sim.tick();
    expect(sim.stats.streamsSpawned).toBe(1);
    expect(sim.streams.count).toBe(0);
    expect(sim.stats.splashesSpawned).toBe(0);
  });

  it("pools at a sink with a symmetric splash", () => {
    const scene = buildScene(10, 10, (x) => ({ depth: 200, ground: true, flowX: x === 2 ? 127 : 0 }));
    const sim = streamAt(scene);
    for (let k = 0; k < 3; k++) sim.tick();
    expect(sim.streams.count).toBe(0);
    expect(sim.stats.splashesSpawned).toBe(1);
    expect(sim.splashes.type[0]).toBe(SplashType.Symmetric);
    expect(sim.splashes.y[0]).toBe(5);
  });

  it("drips off the ground mask with a right-biased splash", () => {
    const scene = buildScene(10, 10, (x) =>
      x < 4 ? { depth: 200, ground: true, flowX: 127 } : { depth: 200, ground: false },
    );
    const sim = streamAt(scene);
    for (let k = 0; k < 8; k++) sim.tick();
    expect(sim.streams.count).toBe(0);
    expect(sim.stats.splashesSpawned).toBe(1);
    expect(sim.splashes.type[0]).toBe(SplashType.RightBiased);
  });

  it("expires when life runs out", () => {
    const sim = streamAt(buildScene(10, 10, () => ({ depth: 200, ground: true, flowX: 127 })), { streamLife: 3 });
    for (let k = 0; k < 3; k++) sim.tick();
    expect(sim.streams.count).toBe(1);
    expect(sim.streams.life[0]).toBe(0);
    sim.tick();
    expect(sim.streams.count).toBe(0);
    expect(sim.stats.splashesSpawned).toBe(0);
  });
});

describe("RainSimulation scenarios", () => {
  it("never splashes on an all-sky scene", () => {
    const sim = new RainSimulation(skyScene(), 10, 10, { seed: "sky" });
    for (let k = 0; k < 1000; k++) {
      sim.tick();
      expect(sim.splashes.count).toBe(0);
      expect(sim.streams.count).toBe(0);
    }
    expect(sim.stats.surfaceHits).toBe(0);
    expect(sim.stats.groundHits).toBe(0);
    expect(sim.stats.splashesSpawned).toBe(0);
    expect(sim.stats.exits).toBeGreaterThan(0);
    expect(sim.stats.exits + sim.drops.count).toBe(sim.stats.spawned);
  });

  it("collides at the depth-200 row and splashes there", () => {
    const sim = quiet(ledgeScene(), { surfaceSplashChance: 1 });
    sim.drops.spawn({ x: 3.5, y: 4, z: Z_200, v: 1 });
    sim.tick();

    expect(sim.drops.count).toBe(0);
    expect(sim.stats.surfaceHits).toBe(1);
    expect(sim.splashes.count).toBe(1);
    expect(sim.splashes.y[0]).toBe(5);
    expect(sim.splashes.frame[0]).toBe(1);
    expect([SplashType.Symmetric, SplashType.Scattered]).toContain(sim.splashes.type[0]);
    expect(Array.from(sim.buffer.subarray(50, 60))).toContain(81);
  });

  it("stops at the depth-200 row at natural fall speed from any start", () => {
    for (let k = 0; k < 10; k++) {
      const startY = 3.8 + k * 0.1;
      const sim = quiet(ledgeScene(), { surfaceSplashChance: 1 });
      sim.drops.spawn({ x: 3.5, y: startY, z: Z_200, v: 0 });
      expect(sim.drops.v[0]).toBeGreaterThan(1.4);
      for (let t = 0; t < 10 && sim.drops.count > 0; t++) sim.tick();

      expect(sim.stats.surfaceHits).toBe(1);
      expect(sim.stats.exits).toBe(0);
      expect(sim.splashes.count).toBe(1);
      expect(sim.splashes.y[0]).toBe(5);
    }
  });

  it("reallocates the frame and clears entities on resize", () => {
    const scene = new SceneGenerator("resize").generate(64, 32);
    const sim = new RainSimulation(scene, 80, 24, { seed: "resize" });
    for (let k = 0; k < 50; k++) sim.tick();
    expect(sim.liveCount).toBeGreaterThan(0);

    sim.resize(40, 12);
    expect(sim.buffer.length).toBe(40 * 12);
    expect(sim.liveCount).toBe(0);
    expect(sim.buffer.every((v) => v === 0)).toBe(true);

    for (let k = 0; k < 50; k++) sim.tick();
    expect(sim.buffer.length).toBe(480);
    for (let i = 0; i < sim.drops.count; i++) {
      expect(sim.drops.x[i]).toBeLessThan(40);
      expect(sim.drops.y[i]).toBeLessThan(12);
    }
  });

  it("produces identical frames for the same seed", () => {
    const scene = new SceneGenerator("det").generate(64, 32);
    const run = (seed: string) => {
      const sim = new RainSimulation(scene, 80, 24, { seed });
      for (let k = 0; k < 200; k++) sim.tick();
      return sim;
    };
    const a = run("same");
    const b = run("same");
    expect(a.buffer).toEqual(b.buffer);
    expect(a.stats).toEqual(b.stats);
    expect(a.buffer.some((v) => v !== 0)).toBe(true);
    expect(run("other").buffer).not.toEqual(a.buffer);
  });

  it("re-encoding the same state is idempotent", () => {
    const scene = new SceneGenerator("idem").generate(64, 32);
    const sim = new RainSimulation(scene, 80, 24, { seed: "idem" });
    for (let k = 0; k < 60; k++) sim.tick();
    const before = sim.buffer.slice();
    sim.encode();
    expect(sim.buffer).toEqual(before);
  });
});
