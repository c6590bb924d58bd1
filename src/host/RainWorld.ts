import type { SceneGeometry } from "../scene/SceneGeometry.js";
import { RainSimulation, type RainSimulationOptions, type SimulationStats } from "../sim/RainSimulation.js";

/**
 * Read-only view of one frame. `cells` aliases the simulation's buffer and is
 * only meaningful while `RainWorld.isCurrent(view)` holds: the next tick()
 * overwrites it and the next resize() replaces it.
 */
export interface FrameView {
  readonly cells: Uint8Array;
  readonly width: number;
  readonly height: number;
  readonly generation: number;
}

export type RainWorldOptions = RainSimulationOptions;

/** Host control surface over a RainSimulation. */
export class RainWorld {
  private readonly sim: RainSimulation;
  private generation = 0;

  constructor(scene: SceneGeometry, width: number, height: number, options: RainWorldOptions = {}) {
    this.sim = new RainSimulation(scene, width, height, options);
  }

  get width(): number {
    return this.sim.width;
  }

  get height(): number {
    return this.sim.height;
  }

  /** Droplets + splashes + streams currently alive. */
  get liveCount(): number {
    return this.sim.liveCount;
  }

  get stats(): Readonly<SimulationStats> {
    return this.sim.stats;
  }

  resize(width: number, height: number): void {
    this.sim.resize(width, height);
    this.generation++;
  }

  tick(): void {
    this.sim.tick();
    this.generation++;
  }

  frame(): FrameView {
    return {
      cells: this.sim.buffer,
      width: this.sim.width,
      height: this.sim.height,
      generation: this.generation,
    };
  }

  isCurrent(view: FrameView): boolean {
    return view.generation === this.generation;
  }
}
