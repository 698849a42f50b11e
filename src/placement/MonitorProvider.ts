import type { Monitor } from "../types";
import type { RandomSource } from "../random/Random";
import { defaultRandom, randomInt } from "../random/Random";

/**
 * Supplies the display a new popup appears on. Enumerating displays is the
 * host's job; the engine only asks for one rectangle per popup.
 */
export interface MonitorProvider {
  pickMonitor(): Monitor;
}

/**
 * Picks uniformly among a fixed list of monitors.
 */
export class RandomMonitorProvider implements MonitorProvider {
  private monitors: readonly Monitor[];
  private rng: RandomSource;

  constructor(monitors: readonly Monitor[], rng: RandomSource = defaultRandom) {
    if (monitors.length === 0) {
      throw new Error("RandomMonitorProvider needs at least one monitor");
    }
    this.monitors = monitors.map((m) => ({ ...m }));
    this.rng = rng;
  }

  pickMonitor(): Monitor {
    return this.monitors[randomInt(this.rng, 0, this.monitors.length - 1)];
  }
}
