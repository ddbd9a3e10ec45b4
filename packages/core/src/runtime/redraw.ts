/**
 * packages/core/src/runtime/redraw.ts: Redraw request ports.
 *
 * Widgets never ask which thread or task they run on. They call
 * `requestRedraw()`; the port decides whether that redraws now or defers to
 * the UI loop.
 */

export type RedrawPort = Readonly<{
  requestRedraw: () => void;
}>;

/** Host primitive that runs `task` later on the UI loop. */
export type ScheduleOnUiThread = (task: () => void) => void;

export const NOOP_REDRAW: RedrawPort = Object.freeze({
  requestRedraw: () => {},
});

/** Redraws synchronously; for callers already on the UI loop. */
export function createImmediateRedrawPort(redraw: () => void): RedrawPort {
  return Object.freeze({
    requestRedraw: () => {
      redraw();
    },
  });
}

/**
 * Defers the redraw to the UI loop. Requests made before the scheduled task
 * runs collapse into one redraw.
 */
export function createDeferredRedrawPort(
  schedule: ScheduleOnUiThread,
  redraw: () => void,
): RedrawPort {
  let pending = false;
  return Object.freeze({
    requestRedraw: () => {
      if (pending) return;
      pending = true;
      try {
        schedule(() => {
          pending = false;
          redraw();
        });
      } catch (err) {
        // Nothing was queued; let the next request try again.
        pending = false;
        throw err;
      }
    },
  });
}
