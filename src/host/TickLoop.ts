import { TICK_RATE } from "../config/constants.js";
import { simLogError } from "./simLog.js";

/**
 * Fixed-rate tick driver using setInterval.
 * A tick that throws is logged and the loop keeps running.
 */
export class TickLoop {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private readonly tickFn: () => void;
  private intervalMs: number;

  constructor(tickFn: () => void, tickRate = TICK_RATE) {
    this.tickFn = tickFn;
    this.intervalMs = tickRate > 0 ? 1000 / tickRate : 1000 / TICK_RATE;
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  get tickMs(): number {
    return this.intervalMs;
  }

  start(): void {
    if (this.intervalId !== null) return;
    this.intervalId = setInterval(() => {
      try {
        this.tickFn();
      } catch (err) {
        simLogError("tick error", err);
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  setTickRate(hz: number): void {
    if (!(hz > 0)) return;
    this.intervalMs = 1000 / hz;
    // Restart at the new rate if running
    if (this.intervalId !== null) {
      this.stop();
      this.start();
    }
  }
}
