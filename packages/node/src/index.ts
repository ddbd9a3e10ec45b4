/**
 * @popframe/node
 *
 * Node.js helpers for hosting popframe popups.
 */

export {
  type NodeUiScheduler,
  type NodeUiSchedulerOptions,
  createNodeRedrawPort,
  createNodeUiScheduler,
} from "./scheduler.js";
