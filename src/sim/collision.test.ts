import { describe, expect, it } from "vitest";
import { chooseSplash, groundLine, randomSplash, type SplashChoice } from "./collision.js";
import { clampUnit, depthBucket, depthMatches, projectedDepth } from "./depth.js";
import { createRng, type Rng } from "./rng.js";
import { SplashType } from "./Splashes.js";

/** Rng that replays the given draws in order. */
function scripted(...draws: number[]): Rng {
  let i = 0;
  return () => draws[i++ % draws.length];
}

const BIAS = { tiltBias: 1.5, scatterChance: 0.25 };

function fresh(): SplashChoice {
  return { type: SplashType.Symmetric, drift: 0 };
}

describe("depth buckets", () => {
  it("maps near to the highest bucket and far to zero", () => {
    expect(depthBucket(0)).toBe(7);
    expect(depthBucket(0.5)).toBe(4);
    expect(depthBucket(0.99)).toBe(0);
    expect(depthBucket(1)).toBe(0);
  });

  it("clamps out-of-range depth", () => {
    expect(depthBucket(-1)).toBe(7);
    expect(depthBucket(2)).toBe(0);
  });

  it("never increases as z grows", () => {
    let prev = depthBucket(0);
    for (let k = 1; k <= 100; k++) {
      const b = depthBucket(k / 100);
      expect(b).toBeLessThanOrEqual(prev);
      prev = b;
    }
  });

  it("clampUnit sends NaN to the far plane", () => {
    expect(clampUnit(Number.NaN)).toBe(1);
    expect(clampUnit(-0.5)).toBe(0);
    expect(clampUnit(0.25)).toBe(0.25);
  });
});

describe("depthMatches", () => {
  it("projects z onto the scene depth scale", () => {
    expect(projectedDepth(0)).toBe(255);
    expect(projectedDepth(1)).toBe(0);
  });

  it("hits within the margin and misses at or beyond it", () => {
    expect(depthMatches(210, 0, 48, 30)).toBe(true);
    expect(depthMatches(207, 0, 48, 30)).toBe(false);
    expect(depthMatches(100, 0, 48, 30)).toBe(false);
  });

  it("never hits sky", () => {
    expect(depthMatches(30, 0.9, 48, 30)).toBe(false);
    expect(depthMatches(31, 0.9, 48, 30)).toBe(true);
  });

  it("is a pure function of its inputs", () => {
    const z = 55 / 255;
    const first = depthMatches(200, z, 48, 30);
    for (let k = 0; k < 5; k++) expect(depthMatches(200, z, 48, 30)).toBe(first);
    expect(first).toBe(true);
  });
});

describe("chooseSplash", () => {
  it("bursts toward the side a steep surface faces", () => {
    const left = chooseSplash(-1, scripted(0.99, 0.5), BIAS, fresh());
    expect(left).toEqual({ type: SplashType.LeftBiased, drift: -2 });

    const right = chooseSplash(0.5, scripted(0.7, 0.9), BIAS, fresh());
    expect(right).toEqual({ type: SplashType.RightBiased, drift: 2 });
  });

  it("picks scattered or symmetric on flat ground", () => {
    expect(chooseSplash(0, scripted(0.1, 0.1, 0.5), BIAS, fresh()).type).toBe(SplashType.Scattered);
    expect(chooseSplash(0, scripted(0.1, 0.9, 0.5), BIAS, fresh())).toEqual({
      type: SplashType.Symmetric,
      drift: 0,
    });
  });

  it("keeps drift within two cells", () => {
    const rng = createRng("drift");
    const out = fresh();
    for (let k = 0; k < 200; k++) {
      chooseSplash(rng() * 2 - 1, rng, BIAS, out);
      expect(Math.abs(out.drift)).toBeLessThanOrEqual(2);
    }
  });
});

describe("randomSplash", () => {
  it("picks a type and a drift from two draws", () => {
    expect(randomSplash(scripted(0.6, 0), fresh())).toEqual({ type: SplashType.RightBiased, drift: -2 });
    expect(randomSplash(scripted(0.99, 0.99), fresh())).toEqual({ type: SplashType.Scattered, drift: 2 });
  });
});

describe("groundLine", () => {
  it("interpolates between the near and far fractions", () => {
    const plane = { groundNear: 1, groundFar: 0.4 };
    expect(groundLine(100, 0, plane)).toBe(100);
    expect(groundLine(100, 1, plane)).toBeCloseTo(40, 10);
    expect(groundLine(100, 0.5, plane)).toBeCloseTo(70, 10);
  });
});

describe("createRng", () => {
  it("repeats for the same seed", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let k = 0; k < 10; k++) expect(a()).toBe(b());
  });

  it("stays in [0, 1)", () => {
    const rng = createRng("range");
    for (let k = 0; k < 1000; k++) {
      const r = rng();
      expect(r).toBeGreaterThanOrEqual(0);
      expect(r).toBeLessThan(1);
    }
  });
});
