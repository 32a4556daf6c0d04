const FALLBACK_INTERVAL_MS = 16;

/**
 * Call `step` once per animation frame, or every 16ms where
 * `requestAnimationFrame` is unavailable. Returns a function that stops the
 * loop.
 */
export function startTickLoop(step: () => void): () => void {
  let stopped = false;

  if (typeof window !== 'undefined' && typeof window.requestAnimationFrame === 'function') {
    let rafId: number | null = null;
    const frame = () => {
      if (stopped) {
        rafId = null;
        return;
      }
      step();
      rafId = window.requestAnimationFrame(frame);
    };
    rafId = window.requestAnimationFrame(frame);
    return () => {
      stopped = true;
      if (rafId !== null) {
        window.cancelAnimationFrame(rafId);
        rafId = null;
      }
    };
  }

  const interval = setInterval(() => {
    if (!stopped) {
      step();
    }
  }, FALLBACK_INTERVAL_MS);
  return () => {
    stopped = true;
    clearInterval(interval);
  };
}
