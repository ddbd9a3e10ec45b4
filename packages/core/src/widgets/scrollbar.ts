/**
 * packages/core/src/widgets/scrollbar.ts: Thumb-and-track scrollbar.
 *
 * Dragging is relative: the offset follows the pointer delta since the
 * press, not the absolute pointer position. Clicking the track outside the
 * thumb centers the thumb under the pointer.
 */

import { type PopupEvent, type Point, isLeft } from "../events.js";
import type { DrawingBackend } from "../host.js";
import { type Rect, containsInclusive, toPixels } from "../layout/geometry.js";
import {
  clampScroll,
  computeThumb,
  offsetForThumbDrag,
  offsetForTrackClick,
} from "../layout/scrollMath.js";
import { Widget } from "./widget.js";

export type ScrollOrientation = "vertical" | "horizontal";

export type ScrollbarOptions = Readonly<{
  orientation?: ScrollOrientation;
  minThumbSize?: number;
}>;

export class Scrollbar extends Widget {
  readonly orientation: ScrollOrientation;
  minThumbSize: number | undefined;
  scrollOffset = 0;
  maxScroll = 0;
  visibleSize = 0;
  thumbSize = 0;
  thumbPosition = 0;
  thumbHover = false;
  isDragging = false;
  dragStartX = 0;
  dragStartY = 0;
  dragStartOffset = 0;
  onScroll: ((offset: number) => void) | null = null;

  constructor(options: ScrollbarOptions = {}) {
    super(0, 0, 16, 100);
    this.orientation = options.orientation ?? "vertical";
    this.minThumbSize = options.minThumbSize;
  }

  /** Length of the track along the scroll axis, logical units. */
  get trackLength(): number {
    return this.orientation === "vertical" ? this.height : this.width;
  }

  setScrollInfo(scrollOffset: number, maxScroll: number, visibleSize: number): void {
    this.maxScroll = Math.max(0, Number.isFinite(maxScroll) ? maxScroll : 0);
    this.scrollOffset = clampScroll(scrollOffset, this.maxScroll);
    this.visibleSize = Math.max(0, visibleSize);
    this.updateThumb();
  }

  private updateThumb(): void {
    const geometry = computeThumb(
      this.scrollOffset,
      this.maxScroll,
      this.visibleSize,
      this.trackLength,
      this.minThumbSize ?? this.environment().config.minThumbSize,
    );
    this.thumbSize = geometry.thumbSize;
    this.thumbPosition = geometry.thumbPosition;
  }

  thumbRect(): Rect {
    const scale = this.uiScale;
    const pos = toPixels(this.thumbPosition, scale);
    const size = toPixels(this.thumbSize, scale);
    if (this.orientation === "vertical") {
      return { x: this.globalX, y: this.globalY + pos, w: this.scaledWidth, h: size };
    }
    return { x: this.globalX + pos, y: this.globalY, w: size, h: this.scaledHeight };
  }

  isInsideThumb(px: number, py: number): boolean {
    return containsInclusive(this.thumbRect(), px, py);
  }

  private axis(px: number, py: number): number {
    return this.orientation === "vertical" ? py : px;
  }

  private applyOffset(offset: number): void {
    const next = clampScroll(offset, this.maxScroll);
    if (next === this.scrollOffset) return;
    this.scrollOffset = next;
    this.updateThumb();
    this.onScroll?.(next);
  }

  override handleEvent(event: PopupEvent, _pointer: Point): boolean {
    if (event.kind !== "mouse") return false;

    if (isLeft(event, "down")) {
      if (!this.isInside(event.x, event.y)) return false;
      if (this.isInsideThumb(event.x, event.y)) {
        this.isDragging = true;
        this.dragStartX = event.x;
        this.dragStartY = event.y;
        this.dragStartOffset = this.scrollOffset;
        return true;
      }
      const origin = this.orientation === "vertical" ? this.globalY : this.globalX;
      const click = (this.axis(event.x, event.y) - origin) / this.uiScale;
      this.applyOffset(
        offsetForTrackClick(click, this.maxScroll, this.trackLength, this.thumbSize),
      );
      return true;
    }

    if (event.mouseKind === "move") {
      this.thumbHover = this.isInsideThumb(event.x, event.y);
      if (!this.isDragging) return false;
      const start = this.axis(this.dragStartX, this.dragStartY);
      const delta = (this.axis(event.x, event.y) - start) / this.uiScale;
      this.applyOffset(
        offsetForThumbDrag(
          this.dragStartOffset,
          delta,
          this.maxScroll,
          this.trackLength,
          this.thumbSize,
        ),
      );
      return true;
    }

    if (isLeft(event, "up")) {
      const wasDragging = this.isDragging;
      this.isDragging = false;
      return wasDragging;
    }

    return false;
  }

  override draw(backend: DrawingBackend): void {
    backend.drawRect(
      this.globalX,
      this.globalY,
      this.scaledWidth,
      this.scaledHeight,
      this.themeColor("scrollTrack"),
    );
    if (!(this.maxScroll > 0)) return;
    const thumb = this.thumbRect();
    const role = this.thumbHover || this.isDragging ? "scrollThumbHover" : "scrollThumb";
    backend.drawRect(thumb.x, thumb.y, thumb.w, thumb.h, this.themeColor(role));
  }
}
