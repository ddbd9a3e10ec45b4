/**
 * packages/core/src/widgets/button.ts: Push button.
 *
 * Press while hovered arms the button; release while still hovered fires.
 * A button labelled ok/okay/close without a callback finishes its popup.
 */

import { type PopupEvent, type Point, isLeft } from "../events.js";
import type { DrawingBackend } from "../host.js";
import { toLogical } from "../layout/geometry.js";
import { Widget } from "./widget.js";

export type ButtonCallback = () => void;

/** Vertical padding above and below the label, logical units. */
export const BUTTON_VERTICAL_PADDING = 12;

const CLOSE_LABELS: ReadonlySet<string> = new Set(["ok", "okay", "close"]);

export function isCloseLabel(text: string): boolean {
  return CLOSE_LABELS.has(text.trim().toLowerCase());
}

export class Button extends Widget {
  text: string;
  callback: ButtonCallback | null;
  /** Armed by a press inside the button. */
  active = false;

  constructor(text: string, callback: ButtonCallback | null = null) {
    super(0, 0, 100, 30);
    this.text = text;
    this.callback = callback;
  }

  override asButton(): Button {
    return this;
  }

  get fontSizePx(): number {
    return this.fontSizeFor(this.environment().config.fontScale);
  }

  override measure(_availableWidth: number): void {
    const scale = this.uiScale;
    const textHeight = this.measureText(this.text, this.fontSizePx).height;
    this.height = toLogical(textHeight + 2 * BUTTON_VERTICAL_PADDING * scale, scale);
  }

  /** Run the click action: the callback, or the implicit close for close labels. */
  click(): void {
    if (this.callback) {
      this.callback();
      return;
    }
    if (isCloseLabel(this.text)) {
      const popup = this.findPopup();
      if (popup) popup.finished = true;
    }
  }

  override handleEvent(event: PopupEvent, _pointer: Point): boolean {
    if (isLeft(event, "down")) {
      if (!this.hover) return false;
      this.active = true;
      return true;
    }

    if (isLeft(event, "up")) {
      const wasActive = this.active;
      this.active = false;
      if (wasActive && this.hover) {
        this.click();
        return true;
      }
      return wasActive;
    }

    return false;
  }

  override draw(backend: DrawingBackend): void {
    const gx = this.globalX;
    const gy = this.globalY;
    const w = this.scaledWidth;
    const h = this.scaledHeight;

    let fill = this.themeColor("buttonFill");
    if (this.active && this.hover) fill = this.themeColor("buttonActive");
    else if (this.hover) fill = this.themeColor("buttonHover");
    backend.drawRect(gx, gy, w, h, fill);

    const fontSize = this.fontSizePx;
    const extent = this.measureText(this.text, fontSize);
    backend.drawText(
      this.text,
      gx + Math.trunc((w - extent.width) / 2),
      gy + Math.trunc((h - extent.height) / 2),
      fontSize,
      this.themeColor("buttonText"),
    );
  }
}
