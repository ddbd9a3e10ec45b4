import type { PopupEvent, Point } from "../events.js";
import type { DrawingBackend } from "../host.js";
import { WidgetBuilder } from "./builder.js";
import { Widget } from "./widget.js";

/**
 * Horizontal container. Children share the width equally, then every child
 * is stretched to the height of the tallest one.
 */
export class Row extends Widget {
  /** Gap between children; falls back to the popup's `rowSpacing`. */
  spacing: number | undefined;

  constructor(spacing?: number) {
    super(0, 0, 100, 30);
    this.spacing = spacing;
  }

  get add(): WidgetBuilder {
    return new WidgetBuilder(this);
  }

  override measure(availableWidth: number): void {
    this.width = availableWidth;
    this.layout();
  }

  override layout(): void {
    const children = this.children;
    const n = children.length;
    if (n === 0) return;

    const spacing = this.spacing ?? this.environment().config.rowSpacing;
    const childWidth = Math.max(0, Math.floor((this.width - (n - 1) * spacing) / n));

    let tallest = 0;
    for (const child of children) {
      child.width = childWidth;
      if (child.measure) child.measure(childWidth);
      else child.layout();
      if (child.height > tallest) tallest = child.height;
    }

    this.height = tallest;
    for (let i = 0; i < n; i++) {
      const child = children[i];
      if (child === undefined) continue;
      child.x = i * (childWidth + spacing);
      child.y = 0;
      child.height = tallest;
    }
  }

  override handleEvent(event: PopupEvent, pointer: Point): boolean {
    for (const child of this.children) {
      child.hover = this.hover && child.isInside(pointer.x, pointer.y);
    }
    for (const child of this.children) {
      if (child.handleEvent(event, pointer)) return true;
    }
    return false;
  }

  override draw(backend: DrawingBackend): void {
    for (const child of this.children) child.draw(backend);
  }
}
