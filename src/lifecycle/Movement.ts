import type { Monitor, Rectangle } from "../types";
import type { RandomSource } from "../random/Random";
import { randomInt } from "../random/Random";

/** Delay between movement steps. */
export const MOVE_INTERVAL_MS = 10;

export interface Velocity {
  vx: number;
  vy: number;
}

/**
 * Random integer velocity with each axis in [-speed, speed], never (0, 0).
 * Returns null when speed leaves no non-zero choice.
 */
export function pickVelocity(rng: RandomSource, speed: number): Velocity | null {
  const s = Math.floor(speed);
  if (s < 1) return null;

  let vx = 0;
  let vy = 0;
  while (vx === 0 && vy === 0) {
    vx = randomInt(rng, -s, s);
    vy = randomInt(rng, -s, s);
  }
  return { vx, vy };
}

/**
 * Advance one step. An axis whose edge reaches or crosses the monitor
 * boundary is pinned to that boundary and its velocity reversed.
 */
export function stepMovement(
  rect: Rectangle,
  velocity: Velocity,
  monitor: Monitor,
): { rect: Rectangle; velocity: Velocity } {
  let { vx, vy } = velocity;
  let x = rect.x + vx;
  let y = rect.y + vy;

  const maxX = monitor.x + monitor.width - rect.width;
  const maxY = monitor.y + monitor.height - rect.height;

  if (x <= monitor.x || x >= maxX) {
    x = Math.min(Math.max(x, monitor.x), Math.max(monitor.x, maxX));
    vx = -vx;
  }
  if (y <= monitor.y || y >= maxY) {
    y = Math.min(Math.max(y, monitor.y), Math.max(monitor.y, maxY));
    vy = -vy;
  }

  return {
    rect: { x, y, width: rect.width, height: rect.height },
    velocity: { vx, vy },
  };
}
