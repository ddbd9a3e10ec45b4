/**
 * packages/core/src/widgets/widget.ts: Retained widget base class.
 *
 * A widget owns its children and keeps a non-owning `parent` back reference
 * used for coordinate resolution and for finding the owning popup.
 *
 * Coordinates: `x`/`y`/`width`/`height` are logical units relative to the
 * parent's content origin. A root widget's `x`/`y` are region pixels.
 * `globalX`/`globalY` resolve to region pixels, Y growing downward.
 */

import { DEFAULT_POPUP_CONFIG, type ResolvedPopupConfig } from "../config.js";
import { describeThrown } from "../errors.js";
import type { PopupEvent, Point } from "../events.js";
import {
  type DrawingBackend,
  type MetricsProvider,
  type TextExtent,
  fallbackMetrics,
  resolveThemeColor,
  safeBaseFontSize,
  safeUiScale,
} from "../host.js";
import { containsInclusive, toPixels } from "../layout/geometry.js";
import { logTag } from "../logger.js";
import { NOOP_REDRAW, type RedrawPort } from "../runtime/redraw.js";
import type { Rgba, ThemeRole } from "../theme/palette.js";
import type { Button } from "./button.js";
import type { Popup } from "./popup.js";

/** Host services a widget reaches through its root popup. */
export type WidgetEnvironment = Readonly<{
  metrics: MetricsProvider;
  redraw: RedrawPort;
  config: ResolvedPopupConfig;
}>;

export const DETACHED_ENVIRONMENT: WidgetEnvironment = Object.freeze({
  metrics: fallbackMetrics,
  redraw: NOOP_REDRAW,
  config: DEFAULT_POPUP_CONFIG,
});

const ZERO_OFFSET: Point = Object.freeze({ x: 0, y: 0 });

export abstract class Widget {
  x: number;
  y: number;
  width: number;
  height: number;
  hover = false;
  focused = false;
  /** Set by the owning container; never owns the parent. */
  parent: Widget | null = null;

  private readonly ownedChildren: Widget[] = [];

  /**
   * Optional measuring hook: adapt to `availableWidth` (logical units) and
   * recompute `height`. Containers call it instead of `layout()` when present.
   */
  measure?(availableWidth: number): void;

  constructor(x = 0, y = 0, width = 100, height = 30) {
    this.x = x;
    this.y = y;
    this.width = width;
    this.height = height;
  }

  get children(): readonly Widget[] {
    return this.ownedChildren;
  }

  addChild<W extends Widget>(child: W): W {
    if (child.parent) child.parent.removeChild(child);
    child.parent = this;
    this.ownedChildren.push(child);
    this.findPopup()?.markLayoutDirty();
    return child;
  }

  removeChild(child: Widget): boolean {
    const i = this.ownedChildren.indexOf(child);
    if (i < 0) return false;
    this.ownedChildren.splice(i, 1);
    child.parent = null;
    this.findPopup()?.markLayoutDirty();
    return true;
  }

  // ===========================================================================
  // Environment
  // ===========================================================================

  environment(): WidgetEnvironment {
    return this.parent ? this.parent.environment() : DETACHED_ENVIRONMENT;
  }

  get uiScale(): number {
    return safeUiScale(this.environment().metrics);
  }

  protected fontSizeFor(multiplier: number, baseOverride?: number): number {
    const base =
      baseOverride !== undefined && Number.isFinite(baseOverride) && baseOverride > 0
        ? baseOverride
        : safeBaseFontSize(this.environment().metrics);
    return Math.trunc(base * multiplier * this.uiScale);
  }

  protected measureText(text: string, fontSize: number): TextExtent {
    return this.environment().metrics.measureText(text, fontSize);
  }

  protected themeColor(role: ThemeRole): Rgba {
    return resolveThemeColor(this.environment().metrics, role);
  }

  requestRedraw(): void {
    const env = this.environment();
    try {
      env.redraw.requestRedraw();
    } catch (err) {
      env.config.logger.warn(logTag("redraw", `redraw request failed: ${describeThrown(err)}`));
    }
  }

  // ===========================================================================
  // Geometry
  // ===========================================================================

  get scaledWidth(): number {
    return toPixels(this.width, this.uiScale);
  }

  get scaledHeight(): number {
    return toPixels(this.height, this.uiScale);
  }

  /** Pixel offset a container applies to one of its children (title bar, scroll). */
  protected childOffset(_child: Widget): Point {
    return ZERO_OFFSET;
  }

  get globalX(): number {
    const p = this.parent;
    if (!p) return this.x;
    return p.globalX + p.childOffset(this).x + toPixels(this.x, this.uiScale);
  }

  get globalY(): number {
    const p = this.parent;
    if (!p) return this.y;
    return p.globalY + p.childOffset(this).y + toPixels(this.y, this.uiScale);
  }

  isInside(px: number, py: number): boolean {
    return containsInclusive(
      { x: this.globalX, y: this.globalY, w: this.scaledWidth, h: this.scaledHeight },
      px,
      py,
    );
  }

  // ===========================================================================
  // Hooks
  // ===========================================================================

  draw(_backend: DrawingBackend): void {}

  /** @returns true when the event was consumed */
  handleEvent(_event: PopupEvent, _pointer: Point): boolean {
    return false;
  }

  /** Self relayout; meaningful for containers. */
  layout(): void {}

  asButton(): Button | null {
    return null;
  }

  asPopup(): Popup | null {
    return null;
  }

  findPopup(): Popup | null {
    for (let n: Widget | null = this; n !== null; n = n.parent) {
      const popup = n.asPopup();
      if (popup) return popup;
    }
    return null;
  }
}
