import { describe, expect, it } from "vitest";
import { SceneGenerator } from "../generation/SceneGenerator.js";
import { RainWorld } from "./RainWorld.js";

const scene = new SceneGenerator("host").generate(48, 24);

describe("RainWorld", () => {
  it("exposes the screen size and a frame of matching length", () => {
    const world = new RainWorld(scene, 20, 8, { seed: "host" });
    expect(world.width).toBe(20);
    expect(world.height).toBe(8);
    const view = world.frame();
    expect(view.cells.length).toBe(160);
    expect(view.width).toBe(20);
    expect(view.height).toBe(8);
  });

  it("counts live entities across all stores", () => {
    const world = new RainWorld(scene, 20, 8, { seed: "host" });
    expect(world.liveCount).toBe(0);
    for (let k = 0; k < 10; k++) world.tick();
    expect(world.liveCount).toBeGreaterThan(0);
    expect(world.stats.ticks).toBe(10);
  });

  it("invalidates frame views on tick and resize", () => {
    const world = new RainWorld(scene, 20, 8, { seed: "host" });
    const first = world.frame();
    expect(world.isCurrent(first)).toBe(true);

    world.tick();
    expect(world.isCurrent(first)).toBe(false);
    const second = world.frame();
    expect(second.generation).toBe(first.generation + 1);

    world.resize(10, 4);
    expect(world.isCurrent(second)).toBe(false);
    const third = world.frame();
    expect(third.cells.length).toBe(40);
    expect(world.isCurrent(third)).toBe(true);
  });

  it("shares the live buffer instead of copying it", () => {
    const world = new RainWorld(scene, 20, 8, { seed: "host" });
    const view = world.frame();
    world.tick();
    expect(world.frame().cells).toBe(view.cells);
  });

  it("rejects a negative resize and keeps the old size", () => {
    const world = new RainWorld(scene, 20, 8);
    expect(() => world.resize(-1, 4)).toThrow(RangeError);
    expect(world.width).toBe(20);
    expect(world.height).toBe(8);
  });
});
