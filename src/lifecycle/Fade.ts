/** Opacity removed per fade tick. */
export const FADE_STEP = 0.01;

/** Delay between fade ticks. */
export const FADE_INTERVAL_MS = 15;

// Opacity is rounded to this many parts to keep repeated subtraction exact
const OPACITY_RESOLUTION = 1e6;

/** Opacity after one fade tick, never below 0. */
export function nextOpacity(opacity: number): number {
  const next = Math.round((opacity - FADE_STEP) * OPACITY_RESOLUTION) / OPACITY_RESOLUTION;
  return Math.max(0, next);
}
