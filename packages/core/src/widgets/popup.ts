/**
 * packages/core/src/widgets/popup.ts: Modal popup root container.
 *
 * Layout stacks children top-down below a title bar. When the stack is
 * taller than `maxHeightRatio` of the region, the popup caps its height,
 * reserves room for a vertical Scrollbar and clips content to the area
 * below the title bar.
 *
 * Event order: wheel, title-bar drag, scrollbar, children (last added
 * first), click swallowing inside the popup, then Enter/Escape.
 *
 * A session ends only through `finished` or `cancelled`; the host polls both.
 */

import { type PopupConfig, type ResolvedPopupConfig, resolvePopupConfig } from "../config.js";
import { PopupUiError, describeThrown } from "../errors.js";
import { type PopupEvent, type Point, isKeyPress, isLeft } from "../events.js";
import {
  type DrawingBackend,
  type HostRegion,
  type MetricsProvider,
  fallbackMetrics,
  isUsableRegion,
} from "../host.js";
import { type Rect, clamp, containsInclusive, toPixels } from "../layout/geometry.js";
import { clampScroll } from "../layout/scrollMath.js";
import { logTag } from "../logger.js";
import { NOOP_REDRAW, type RedrawPort } from "../runtime/redraw.js";
import { Button } from "./button.js";
import { WidgetBuilder } from "./builder.js";
import { Label } from "./label.js";
import { Scrollbar } from "./scrollbar.js";
import { Widget, type WidgetEnvironment } from "./widget.js";

/** Height cap in pixels used before a region is known. */
const FALLBACK_MAX_HEIGHT_PX = 600;

export type PopupOptions = Readonly<{
  /** Text shown as a Label above anything added later. */
  message?: string;
  /** Fixed width in logical units; otherwise `defaultWidth`. */
  width?: number;
  /** Fixed height in logical units; otherwise the popup fits its content. */
  height?: number;
  /**
   * Swallow every pointer event, even unclaimed ones outside the popup.
   * Defaults to false: the host still gets wheel, middle-button and outside clicks.
   */
  blocking?: boolean;
  preventClose?: boolean;
  onEnter?: () => void;
  onCancel?: () => void;
  metrics?: MetricsProvider;
  redraw?: RedrawPort;
  config?: PopupConfig;
}>;

export class Popup extends Widget {
  title: string;
  finished = false;
  cancelled = false;
  shown = false;
  blocking: boolean;
  onEnter: (() => void) | null;
  onCancel: (() => void) | null;

  scrollOffset = 0;
  maxScroll = 0;
  isScrollable = false;
  /** Scrollable extent below the title bar, logical units. */
  contentHeight = 0;
  visibleContentHeight = 0;
  scrollbar: Scrollbar | null = null;

  isDragging = false;
  dragOffsetX = 0;
  dragOffsetY = 0;

  readonly autoHeight: boolean;
  region: HostRegion | null = null;
  needsLayout = false;

  private preventCloseFlag: boolean;
  private readonly env: WidgetEnvironment;
  private lastPointer: Point = Object.freeze({ x: 0, y: 0 });

  constructor(title: string, options: PopupOptions = {}) {
    const config = resolvePopupConfig(options.config);
    super(0, 0, options.width ?? config.defaultWidth, options.height ?? config.defaultHeight);
    this.env = Object.freeze({
      metrics: options.metrics ?? fallbackMetrics,
      redraw: options.redraw ?? NOOP_REDRAW,
      config,
    });
    this.title = title;
    this.autoHeight = options.height === undefined;
    this.blocking = options.blocking ?? false;
    this.preventCloseFlag = options.preventClose ?? false;
    this.onEnter = options.onEnter ?? null;
    this.onCancel = options.onCancel ?? null;
    if (options.message !== undefined) this.addChild(new Label(options.message));
  }

  override environment(): WidgetEnvironment {
    return this.env;
  }

  get config(): ResolvedPopupConfig {
    return this.env.config;
  }

  override asPopup(): Popup {
    return this;
  }

  get add(): WidgetBuilder {
    return new WidgetBuilder(this);
  }

  get preventClose(): boolean {
    return this.preventCloseFlag;
  }

  /** Changing this re-runs default button injection at the next draw. */
  set preventClose(value: boolean) {
    if (value === this.preventCloseFlag) return;
    this.preventCloseFlag = value;
    this.markLayoutDirty();
  }

  get isClosed(): boolean {
    return this.finished || this.cancelled;
  }

  markLayoutDirty(): void {
    this.needsLayout = true;
  }

  private readonly finish = (): void => {
    this.finished = true;
  };

  // ===========================================================================
  // Default actions
  // ===========================================================================

  /** True when a Button is a child or a grandchild (one level into containers). */
  hasButton(): boolean {
    return this.children.some(
      (child) => child.asButton() !== null || child.children.some((g) => g.asButton() !== null),
    );
  }

  private ensureDefaultButton(): void {
    if (this.preventCloseFlag || this.hasButton()) return;
    this.addChild(new Button("OK", this.finish));
    if (!this.onEnter) this.onEnter = this.finish;
  }

  /** Append a button that finishes the popup. */
  addCloseButton(text = "OK"): Button {
    const button = this.addChild(new Button(text, this.finish));
    if (!this.onEnter) this.onEnter = this.finish;
    if (this.region) this.layoutChildren();
    return button;
  }

  // ===========================================================================
  // Layout
  // ===========================================================================

  /** First full layout against `region`: default button, stack, centering. */
  updateLayout(region: HostRegion | null | undefined): void {
    if (!isUsableRegion(region)) {
      throw new PopupUiError("POPUP_HOST_UNAVAILABLE", "no drawable region for popup");
    }
    this.region = region;
    this.ensureDefaultButton();
    this.layoutChildren();
    this.x = Math.trunc((region.width - this.scaledWidth) / 2);
    this.y = Math.trunc((region.height - this.scaledHeight) / 2);
  }

  override layout(): void {
    this.layoutChildren();
  }

  private refreshLayout(): void {
    this.ensureDefaultButton();
    this.layoutChildren();
  }

  /** Measured stack height of all children at `contentWidth`, padding included. */
  private measureChildren(contentWidth: number): number {
    const children = this.children;
    let sum = 0;
    for (const child of children) {
      if (child.measure) child.measure(contentWidth);
      else child.layout();
      sum += child.height;
    }
    return sum + this.config.padding * Math.max(0, children.length - 1);
  }

  layoutChildren(): void {
    const { margin, padding, titleHeight, scrollbarWidth, maxHeightRatio } = this.config;
    const scale = this.uiScale;
    const region = this.region;
    const capPx = region ? Math.floor(region.height * maxHeightRatio) : FALLBACK_MAX_HEIGHT_PX;
    const cap = capPx / scale;

    let contentWidth = Math.max(0, this.width - 2 * margin);
    let stack = this.measureChildren(contentWidth);
    const total = titleHeight + padding + stack + margin;

    if (total > cap) {
      this.isScrollable = true;
      this.height = Math.floor(cap);
      this.visibleContentHeight = Math.max(0, this.height - titleHeight);
      contentWidth = Math.max(0, this.width - scrollbarWidth - 2 * margin);
      stack = this.measureChildren(contentWidth);
      this.contentHeight = padding + stack + margin;
      this.maxScroll = Math.max(0, this.contentHeight - this.visibleContentHeight);
      this.scrollOffset = clampScroll(this.scrollOffset, this.maxScroll);

      let bar = this.scrollbar;
      if (!bar) {
        bar = new Scrollbar({ orientation: "vertical" });
        bar.parent = this;
        bar.onScroll = (offset) => this.scrollTo(offset);
        this.scrollbar = bar;
      }
      bar.x = this.width - scrollbarWidth;
      bar.y = titleHeight;
      bar.width = scrollbarWidth;
      bar.height = this.visibleContentHeight;
      bar.setScrollInfo(this.scrollOffset, this.maxScroll, this.visibleContentHeight);
    } else {
      this.isScrollable = false;
      this.scrollOffset = 0;
      this.maxScroll = 0;
      if (this.scrollbar) {
        this.scrollbar.parent = null;
        this.scrollbar = null;
      }
      this.contentHeight = padding + stack + margin;
      this.visibleContentHeight = this.contentHeight;

      if (this.autoHeight) {
        const oldCenter = this.y + this.scaledHeight / 2;
        this.height = total;
        let nextY = oldCenter - this.scaledHeight / 2;
        if (region) nextY = clamp(nextY, 0, Math.max(0, region.height - this.scaledHeight));
        this.y = Math.trunc(nextY);
      }
    }

    let cursorY = padding;
    for (const child of this.children) {
      child.x = margin;
      child.y = cursorY;
      child.width = contentWidth;
      child.layout();
      cursorY += child.height + padding;
    }
    this.needsLayout = false;
  }

  scrollTo(offset: number): void {
    if (!this.isScrollable) return;
    const next = clampScroll(offset, this.maxScroll);
    if (next === this.scrollOffset) return;
    this.scrollOffset = next;
    this.scrollbar?.setScrollInfo(next, this.maxScroll, this.visibleContentHeight);
  }

  // ===========================================================================
  // Geometry
  // ===========================================================================

  get titleHeightPx(): number {
    return toPixels(this.config.titleHeight, this.uiScale);
  }

  protected override childOffset(child: Widget): Point {
    if (child === this.scrollbar) return { x: 0, y: 0 };
    return { x: 0, y: this.titleHeightPx - toPixels(this.scrollOffset, this.uiScale) };
  }

  titleBarRect(): Rect {
    return { x: this.globalX, y: this.globalY, w: this.scaledWidth, h: this.titleHeightPx };
  }

  /** Area children are visible in: below the title bar, inside the popup. */
  contentViewport(): Rect {
    const titlePx = this.titleHeightPx;
    return {
      x: this.globalX,
      y: this.globalY + titlePx,
      w: this.scaledWidth,
      h: Math.max(0, this.scaledHeight - titlePx),
    };
  }

  /** Move the top-left corner, keeping the popup inside the region. */
  moveTo(x: number, y: number): void {
    const region = this.region;
    if (!region) {
      this.x = Math.trunc(x);
      this.y = Math.trunc(y);
      return;
    }
    this.x = Math.trunc(clamp(x, 0, Math.max(0, region.width - this.scaledWidth)));
    this.y = Math.trunc(clamp(y, 0, Math.max(0, region.height - this.scaledHeight)));
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  private reportThrow(source: string, err: unknown): void {
    this.config.logger.error(
      logTag("event", `POPUP_CALLBACK_THROW: ${source} threw: ${describeThrown(err)}`),
    );
  }

  private dispatchTo(child: Widget, event: PopupEvent, pointer: Point): boolean {
    try {
      return child.handleEvent(event, pointer);
    } catch (err) {
      this.reportThrow("widget event handler", err);
      return false;
    }
  }

  private runAction(source: string, action: () => void): boolean {
    try {
      action();
      return true;
    } catch (err) {
      this.reportThrow(source, err);
      return false;
    }
  }

  private updateHover(pointer: Point): void {
    this.hover = this.isInside(pointer.x, pointer.y);
    const inViewport = containsInclusive(this.contentViewport(), pointer.x, pointer.y);
    for (const child of this.children) {
      child.hover = inViewport && child.isInside(pointer.x, pointer.y);
    }
    if (this.scrollbar) this.scrollbar.hover = this.scrollbar.isInside(pointer.x, pointer.y);
  }

  private handleDrag(event: PopupEvent): boolean {
    if (event.kind !== "mouse") return false;
    if (isLeft(event, "down") && containsInclusive(this.titleBarRect(), event.x, event.y)) {
      this.isDragging = true;
      this.dragOffsetX = event.x - this.x;
      this.dragOffsetY = event.y - this.y;
      return true;
    }
    if (!this.isDragging) return false;
    if (event.mouseKind === "move") {
      this.moveTo(event.x - this.dragOffsetX, event.y - this.dragOffsetY);
      return true;
    }
    if (isLeft(event, "up")) {
      this.isDragging = false;
      return true;
    }
    return false;
  }

  override handleEvent(event: PopupEvent, _pointer?: Point): boolean {
    if (event.kind === "mouse") this.lastPointer = Object.freeze({ x: event.x, y: event.y });
    const pointer = this.lastPointer;
    if (this.needsLayout && this.region) this.refreshLayout();
    this.updateHover(pointer);

    if (event.kind === "mouse" && event.mouseKind === "wheel") {
      if (!this.isScrollable || !this.hover) return false;
      this.scrollTo(this.scrollOffset + event.wheelY * this.config.wheelStep);
      return true;
    }

    if (this.handleDrag(event)) return true;

    if (this.scrollbar && this.dispatchTo(this.scrollbar, event, pointer)) return true;

    const children = this.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined && this.dispatchTo(child, event, pointer)) return true;
    }

    if (
      event.kind === "mouse" &&
      (event.mouseKind === "down" || event.mouseKind === "up") &&
      this.hover
    ) {
      return true;
    }

    if (isKeyPress(event, "enter")) {
      if (this.preventCloseFlag) return true;
      if (this.onEnter) return this.runAction("onEnter", this.onEnter);
      return false;
    }

    if (isKeyPress(event, "escape")) {
      if (this.preventCloseFlag) return true;
      if (this.onCancel) return this.runAction("onCancel", this.onCancel);
      this.cancelled = true;
      return true;
    }

    return false;
  }

  // ===========================================================================
  // Drawing
  // ===========================================================================

  override draw(backend: DrawingBackend): void {
    if (this.needsLayout && this.region) this.refreshLayout();

    const gx = this.globalX;
    const gy = this.globalY;
    const w = this.scaledWidth;
    const h = this.scaledHeight;
    const scale = this.uiScale;
    const titlePx = this.titleHeightPx;
    const marginPx = toPixels(this.config.margin, scale);

    backend.drawRect(gx, gy, w, h, this.themeColor("popupBackground"));
    backend.drawRectBorder(gx, gy, w, h, this.themeColor("popupBorder"), 1);
    backend.drawRect(gx, gy, w, titlePx, this.themeColor("titleBar"));

    if (this.title.length > 0) {
      const fontSize = this.fontSizeFor(this.config.fontScale);
      const extent = this.measureText(this.title, fontSize);
      backend.drawText(
        this.title,
        gx + marginPx,
        gy + Math.trunc((titlePx - extent.height) / 2),
        fontSize,
        this.themeColor("titleText"),
      );
    }

    const bar = this.isScrollable ? this.scrollbar : null;
    if (bar) {
      const barPx = toPixels(this.config.scrollbarWidth, scale);
      backend.pushClip(gx + marginPx, gy + titlePx, w - barPx - 2 * marginPx, h - titlePx);
    }
    for (const child of this.children) child.draw(backend);
    if (bar) {
      backend.popClip();
      bar.draw(backend);
    }
  }
}
