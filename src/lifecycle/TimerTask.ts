/**
 * Run `callback` once after `delayMs` unless `signal` aborts first.
 */
export function runAfter(delayMs: number, callback: () => void, signal: AbortSignal): void {
  if (signal.aborted) return;

  const timer = setTimeout(() => {
    signal.removeEventListener("abort", cancel);
    callback();
  }, delayMs);
  const cancel = (): void => clearTimeout(timer);
  signal.addEventListener("abort", cancel, { once: true });
}

/**
 * Run `step` every `intervalMs` (first run after `initialDelayMs`) until it
 * returns false or `signal` aborts. Each run is scheduled only after the
 * previous one finished, so steps never overlap.
 */
export function runEvery(
  intervalMs: number,
  step: () => boolean,
  signal: AbortSignal,
  initialDelayMs = intervalMs,
): void {
  if (signal.aborted) return;

  let timer: ReturnType<typeof setTimeout> | null = null;
  const cancel = (): void => {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const tick = (): void => {
    timer = null;
    if (signal.aborted) return;
    if (!step() || signal.aborted) {
      signal.removeEventListener("abort", cancel);
      return;
    }
    timer = setTimeout(tick, intervalMs);
  };

  signal.addEventListener("abort", cancel, { once: true });
  timer = setTimeout(tick, initialDelayMs);
}
