/**
 * packages/node/src/scheduler.ts: UI-loop scheduling on the Node event loop.
 *
 * Tasks scheduled from timers, promises or stream callbacks are queued and
 * drained together in one `setImmediate` turn, in scheduling order.
 */

import {
  type PopupLogger,
  type RedrawPort,
  type ScheduleOnUiThread,
  consoleLogger,
  createDeferredRedrawPort,
  describeThrown,
  logTag,
} from "@popframe/core";

export type NodeUiScheduler = Readonly<{
  schedule: ScheduleOnUiThread;
  /** Number of tasks waiting for the next drain. */
  pending: () => number;
  /** Drop queued tasks and cancel the pending drain. */
  dispose: () => void;
}>;

export type NodeUiSchedulerOptions = Readonly<{
  logger?: PopupLogger;
}>;

export function createNodeUiScheduler(opts: NodeUiSchedulerOptions = {}): NodeUiScheduler {
  const logger = opts.logger ?? consoleLogger;
  let queue: Array<() => void> = [];
  let immediate: ReturnType<typeof setImmediate> | null = null;
  let disposed = false;

  const drain = (): void => {
    immediate = null;
    const tasks = queue;
    queue = [];
    for (const task of tasks) {
      try {
        task();
      } catch (err) {
        logger.error(logTag("scheduler", `scheduled task threw: ${describeThrown(err)}`));
      }
    }
  };

  return Object.freeze({
    schedule: (task: () => void): void => {
      if (disposed) return;
      queue.push(task);
      if (immediate === null) immediate = setImmediate(drain);
    },
    pending: () => queue.length,
    dispose: (): void => {
      disposed = true;
      queue = [];
      if (immediate !== null) {
        clearImmediate(immediate);
        immediate = null;
      }
    },
  });
}

/**
 * Redraw port for progress reporting from async work: requests made before
 * the next drain collapse into one `redraw()` call.
 */
export function createNodeRedrawPort(redraw: () => void, scheduler: NodeUiScheduler): RedrawPort {
  return createDeferredRedrawPort(scheduler.schedule, redraw);
}
