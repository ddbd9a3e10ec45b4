/**
 * packages/core/src/widgets/progressBar.ts: Determinate progress bar.
 *
 * `update()` may be called from any execution context. It only writes
 * plain fields and asks the redraw port for a frame, throttled to one
 * request per `progressRedrawIntervalMs` unless the work completed or the
 * caller forces it.
 */

import type { DrawingBackend } from "../host.js";
import { clamp, toPixels } from "../layout/geometry.js";
import type { MeasureWidth } from "../layout/textWrap.js";
import { Widget } from "./widget.js";

export const PROGRESS_BAR_HEIGHT = 30;
const TEXT_PADDING = 10;

export type ProgressBarOptions = Readonly<{
  current?: number;
  maxValue?: number;
  text?: string;
  showPercentage?: boolean;
  showValues?: boolean;
}>;

/** Whole percent of `current / maxValue`, clamped to [0, 100]; 0 when `maxValue <= 0`. */
export function progressPercent(current: number, maxValue: number): number {
  if (!(maxValue > 0) || !Number.isFinite(current)) return 0;
  return Math.floor(clamp((current * 100) / maxValue, 0, 100));
}

/**
 * Drop leading code points until the rest fits `maxWidth`.
 * Returns "" when not even the last code point fits.
 */
export function fitTextFromEnd(text: string, maxWidth: number, measure: MeasureWidth): string {
  if (measure(text) <= maxWidth) return text;
  const cps = Array.from(text);
  for (let i = 1; i < cps.length; i++) {
    const rest = cps.slice(i).join("");
    if (measure(rest) <= maxWidth) return rest;
  }
  return "";
}

export class ProgressBar extends Widget {
  current: number;
  maxValue: number;
  text: string;
  showPercentage: boolean;
  showValues: boolean;
  /** Clock reading of the last redraw request. */
  lastRedrawMs = Number.NEGATIVE_INFINITY;

  constructor(options: ProgressBarOptions = {}) {
    super(0, 0, 100, PROGRESS_BAR_HEIGHT);
    this.current = options.current ?? 0;
    this.maxValue = options.maxValue ?? 100;
    this.text = options.text ?? "";
    this.showPercentage = options.showPercentage ?? true;
    this.showValues = options.showValues ?? false;
  }

  get percent(): number {
    return progressPercent(this.current, this.maxValue);
  }

  displayText(): string {
    const parts: string[] = [];
    if (this.text.length > 0) parts.push(this.text);
    if (this.showPercentage) parts.push(`${this.percent}%`);
    if (this.showValues) parts.push(`(${this.current}/${this.maxValue})`);
    return parts.join(" ");
  }

  /**
   * Record progress and request a redraw.
   *
   * @returns whether a redraw was requested
   */
  update(current: number, maxValue?: number, text?: string, forceRedraw = false): boolean {
    this.current = current;
    if (maxValue !== undefined) this.maxValue = maxValue;
    if (text !== undefined) this.text = text;

    const { now, progressRedrawIntervalMs } = this.environment().config;
    const t = now();
    const complete = this.current >= this.maxValue;
    if (!forceRedraw && !complete && t - this.lastRedrawMs < progressRedrawIntervalMs) {
      return false;
    }
    this.lastRedrawMs = t;
    this.requestRedraw();
    return true;
  }

  override measure(_availableWidth: number): void {
    this.height = PROGRESS_BAR_HEIGHT;
  }

  override draw(backend: DrawingBackend): void {
    const gx = this.globalX;
    const gy = this.globalY;
    const w = this.scaledWidth;
    const h = this.scaledHeight;

    backend.drawRect(gx, gy, w, h, this.themeColor("progressTrack"));
    const fillWidth = Math.trunc((w * this.percent) / 100);
    if (fillWidth > 0) backend.drawRect(gx, gy, fillWidth, h, this.themeColor("progressFill"));
    backend.drawRectBorder(gx, gy, w, h, this.themeColor("progressBorder"), 1);

    const label = this.displayText();
    if (label.length === 0) return;

    const fontSize = this.fontSizeFor(this.environment().config.progressFontScale);
    const measureWidth = (s: string): number => this.measureText(s, fontSize).width;
    const pad = toPixels(TEXT_PADDING, this.uiScale);
    const available = w - 2 * pad;

    const fitted = fitTextFromEnd(label, available, measureWidth);
    const extent = this.measureText(fitted, fontSize);
    const x =
      fitted.length < label.length
        ? gx + w - pad - extent.width
        : gx + Math.trunc((w - extent.width) / 2);
    const y = gy + Math.trunc((h - extent.height) / 2);
    backend.drawText(fitted, x, y, fontSize, this.themeColor("progressText"));
  }
}
