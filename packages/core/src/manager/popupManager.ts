/**
 * packages/core/src/manager/popupManager.ts: One-popup-at-a-time session owner.
 *
 * The host integration layer owns a single manager and forwards its frame
 * loop to it. At most one popup is active; others wait in FIFO order and
 * are activated when the active one finishes or is cancelled.
 */

import { PopupUiError, describeThrown } from "../errors.js";
import type { PopupEvent } from "../events.js";
import type { DrawingBackend, HostRegion } from "../host.js";
import { type PopupLogger, consoleLogger, logTag } from "../logger.js";
import type { Popup } from "../widgets/popup.js";

/** Host side of a modal session. */
export interface PopupHost {
  /** Region the popup is laid out against, or null when nothing is drawable. */
  resolveRegion(): HostRegion | null;
  /** Start routing per-frame draw/event calls to the manager for `popup`. */
  requestModal(popup: Popup): void;
  /** Stop routing for `popup`; called once its session ended. */
  releaseModal(popup: Popup): void;
}

export type ShowResult =
  | Readonly<{ ok: true; status: "active" | "queued" }>
  | Readonly<{ ok: false; error: PopupUiError }>;

export type CloseReason = "finished" | "cancelled";

/** What the host should do with an input event after the popup saw it. */
export type ModalEventOutcome = "consumed" | "passThrough";

export type PopupManagerOptions = Readonly<{
  logger?: PopupLogger;
}>;

export class PopupManager {
  private readonly host: PopupHost;
  private readonly logger: PopupLogger;
  private activePopup: Popup | null = null;
  private readonly queue: Popup[] = [];

  constructor(host: PopupHost, options: PopupManagerOptions = {}) {
    this.host = host;
    this.logger = options.logger ?? consoleLogger;
  }

  get active(): Popup | null {
    return this.activePopup;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  /** Popups waiting behind the active one, next first. */
  get queued(): readonly Popup[] {
    return this.queue.slice();
  }

  private activate(popup: Popup): ShowResult {
    const region = this.host.resolveRegion();
    try {
      popup.updateLayout(region);
    } catch (err) {
      if (err instanceof PopupUiError) return Object.freeze({ ok: false, error: err });
      throw err;
    }
    this.activePopup = popup;
    popup.shown = true;
    this.host.requestModal(popup);
    return Object.freeze({ ok: true, status: "active" });
  }

  /** Activate queued popups until one succeeds or the queue is empty. */
  private advance(): void {
    while (this.activePopup === null) {
      const next = this.queue.shift();
      if (next === undefined) return;
      const result = this.activate(next);
      if (!result.ok) {
        const detail = describeThrown(result.error);
        this.logger.error(logTag("manager", `queued popup "${next.title}" not shown: ${detail}`));
      }
    }
  }

  /**
   * Show `popup` now, or queue it behind the active one.
   * Showing the active popup, or one already queued, changes nothing.
   */
  show(popup: Popup): ShowResult {
    if (popup === this.activePopup) return Object.freeze({ ok: true, status: "active" });
    if (this.queue.includes(popup)) return Object.freeze({ ok: true, status: "queued" });
    if (this.activePopup === null) return this.activate(popup);
    this.queue.push(popup);
    return Object.freeze({ ok: true, status: "queued" });
  }

  /** Put `popup` at the front of the queue; shows it at once when idle. */
  queueNext(popup: Popup): ShowResult {
    if (popup === this.activePopup) return Object.freeze({ ok: true, status: "active" });
    const i = this.queue.indexOf(popup);
    if (i >= 0) this.queue.splice(i, 1);
    if (this.activePopup === null) return this.activate(popup);
    this.queue.unshift(popup);
    return Object.freeze({ ok: true, status: "queued" });
  }

  /** End the active session and move on to the next queued popup. */
  closeActive(reason: CloseReason = "finished"): Popup | null {
    const popup = this.activePopup;
    if (!popup) return null;
    if (reason === "finished") popup.finished = true;
    else popup.cancelled = true;
    this.teardown(popup);
    return popup;
  }

  private teardown(popup: Popup): void {
    this.activePopup = null;
    this.host.releaseModal(popup);
    this.advance();
  }

  /**
   * Observe the close flags of the active popup.
   *
   * @returns true when a session ended during this call
   */
  poll(): boolean {
    const popup = this.activePopup;
    if (!popup || !popup.isClosed) return false;
    this.teardown(popup);
    return true;
  }

  handleEvent(event: PopupEvent): ModalEventOutcome {
    const popup = this.activePopup;
    if (!popup) return "passThrough";

    const handled = popup.handleEvent(event);
    if (this.poll()) return "consumed";

    // Keyboard input never reaches the host while a popup is up.
    if (event.kind !== "mouse") return "consumed";
    if (event.mouseKind === "move") return "passThrough";
    if (handled || popup.blocking) return "consumed";

    if (event.mouseKind === "wheel" || event.button === "middle") return "passThrough";
    if (
      (event.button === "left" || event.button === "right") &&
      !popup.isInside(event.x, event.y)
    ) {
      return "passThrough";
    }
    return "consumed";
  }

  draw(backend: DrawingBackend): void {
    this.poll();
    this.activePopup?.draw(backend);
  }
}
