/**
 * packages/core/src/widgets/textInput.ts: Multi-line text field.
 *
 * Focus follows presses: inside focuses and anchors a selection at the
 * pointer, outside blurs. Press-drag extends the selection; release keeps
 * it. Key and text events only apply while focused; Escape blurs without
 * consuming so the popup still sees it.
 */

import { type PopupEvent, type Point, isKeyPress, isLeft } from "../events.js";
import type { DrawingBackend } from "../host.js";
import { clamp, toLogical, toPixels } from "../layout/geometry.js";
import {
  LINE_HEIGHT_REFERENCE,
  type WrappedLine,
  lineHeightFromGlyphHeight,
  lineIndexForCursor,
  wrapTextSpans,
} from "../layout/textWrap.js";
import {
  type TextEditResult,
  applyTextEdit,
  clampCursor,
  normalizeSelection,
} from "../runtime/textEdit.js";
import { Widget } from "./widget.js";

/** Inner padding on every side, logical units. */
export const TEXT_INPUT_PADDING = 10;

export class TextInput extends Widget {
  text: string;
  cursorPos: number;
  selectionStart: number | null = null;
  selectionEnd: number | null = null;
  isSelecting = false;
  lines: readonly WrappedLine[] = [];
  lineHeight = 0;

  private lastAvailableWidth: number | null = null;

  constructor(text = "") {
    super(0, 0, 100, 30);
    this.text = text;
    this.cursorPos = text.length;
  }

  get fontSizePx(): number {
    return this.fontSizeFor(this.environment().config.fontScale);
  }

  /** Ordered selection range, or null when nothing is selected. */
  get selection(): readonly [number, number] | null {
    return normalizeSelection(this.text, this.selectionStart, this.selectionEnd);
  }

  private get paddingPx(): number {
    return toPixels(TEXT_INPUT_PADDING, this.uiScale);
  }

  private measureWidth(s: string): number {
    return this.measureText(s, this.fontSizePx).width;
  }

  override measure(availableWidth: number): void {
    this.lastAvailableWidth = availableWidth;
    const scale = this.uiScale;
    const pad = this.paddingPx;
    const fontSize = this.fontSizePx;
    const textArea = Math.max(1, toPixels(availableWidth, scale) - 2 * pad);

    this.lines = wrapTextSpans(this.text, textArea, (s) => this.measureText(s, fontSize).width);
    this.lineHeight = lineHeightFromGlyphHeight(
      this.measureText(LINE_HEIGHT_REFERENCE, fontSize).height,
    );
    const lineCount = Math.max(1, this.lines.length);
    this.height = toLogical(lineCount * this.lineHeight + 2 * pad, scale);
  }

  private ensureLines(): void {
    if (this.lastAvailableWidth === null) this.measure(this.width);
  }

  /**
   * Map a pointer position to a text index.
   *
   * The line comes from the vertical band under the pointer; within the line,
   * prefixes are measured left to right and the scan stops at the first
   * prefix that is no closer to the pointer than the previous one.
   */
  cursorFromPoint(px: number, py: number): number {
    this.ensureLines();
    if (this.lines.length === 0) return 0;

    const pad = this.paddingPx;
    const relY = py - (this.globalY + pad);
    const rawIndex = this.lineHeight > 0 ? Math.floor(relY / this.lineHeight) : 0;
    const lineIndex = clamp(rawIndex, 0, this.lines.length - 1);
    const line = this.lines[lineIndex];
    if (line === undefined) return 0;

    const relX = px - (this.globalX + pad);
    const cps = Array.from(line.text);
    let best = 0;
    let minDist = Number.POSITIVE_INFINITY;
    let prefix = "";
    let offset = 0;
    for (let i = 0; i <= cps.length; i++) {
      const dist = Math.abs(this.measureWidth(prefix) - relX);
      if (dist >= minDist) break;
      minDist = dist;
      best = offset;
      const cp = cps[i];
      if (cp === undefined) break;
      prefix += cp;
      offset += cp.length;
    }
    return line.startIndex + best;
  }

  private clearSelection(): void {
    this.selectionStart = null;
    this.selectionEnd = null;
  }

  private applyEdit(result: TextEditResult): void {
    this.text = result.value;
    this.cursorPos = clampCursor(result.value, result.cursor);
    this.selectionStart = result.selectionStart;
    this.selectionEnd = result.selectionEnd;
    if (!result.changed) return;

    const popup = this.findPopup();
    if (popup) popup.layoutChildren();
    else this.measure(this.lastAvailableWidth ?? this.width);
  }

  override handleEvent(event: PopupEvent, _pointer: Point): boolean {
    if (event.kind === "mouse") {
      if (isLeft(event, "down")) {
        if (!this.hover) {
          this.focused = false;
          this.isSelecting = false;
          this.clearSelection();
          return false;
        }
        const pos = this.cursorFromPoint(event.x, event.y);
        this.focused = true;
        this.isSelecting = true;
        this.cursorPos = pos;
        this.selectionStart = pos;
        this.selectionEnd = pos;
        return true;
      }
      if (isLeft(event, "up")) {
        if (!this.isSelecting) return false;
        this.isSelecting = false;
        return true;
      }
      if (event.mouseKind === "move" && this.isSelecting) {
        const pos = this.cursorFromPoint(event.x, event.y);
        this.cursorPos = pos;
        this.selectionEnd = pos;
        return true;
      }
      return false;
    }

    if (!this.focused) return false;

    if (isKeyPress(event, "escape")) {
      this.focused = false;
      this.isSelecting = false;
      return false;
    }

    const result = applyTextEdit(event, {
      value: this.text,
      cursor: this.cursorPos,
      selectionStart: this.selectionStart,
      selectionEnd: this.selectionEnd,
    });
    if (!result) return false;
    this.applyEdit(result);
    return true;
  }

  override draw(backend: DrawingBackend): void {
    this.ensureLines();
    const gx = this.globalX;
    const gy = this.globalY;
    const w = this.scaledWidth;
    const h = this.scaledHeight;
    const pad = this.paddingPx;
    const fontSize = this.fontSizePx;
    const lineBox = Math.trunc(this.lineHeight);

    backend.drawRect(gx, gy, w, h, this.themeColor("inputFill"));
    if (this.focused) backend.drawRectBorder(gx, gy, w, h, this.themeColor("inputFocusBorder"), 1);

    backend.pushClip(gx, gy, w, h);
    const selection = this.selection;
    const caretLine = this.focused ? lineIndexForCursor(this.lines, this.cursorPos) : -1;
    const textColor = this.themeColor("inputText");

    for (let i = 0; i < this.lines.length; i++) {
      const line = this.lines[i];
      if (line === undefined) continue;
      const lx = gx + pad;
      const ly = gy + pad + Math.trunc(i * this.lineHeight);

      if (selection) {
        const a = Math.max(selection[0], line.startIndex);
        const b = Math.min(selection[1], line.endIndex);
        if (a < b) {
          const x0 = this.measureWidth(this.text.slice(line.startIndex, a));
          const x1 = this.measureWidth(this.text.slice(line.startIndex, b));
          backend.drawRect(lx + x0, ly, x1 - x0, lineBox, this.themeColor("inputSelection"));
        }
      }

      if (line.text.length > 0) backend.drawText(line.text, lx, ly, fontSize, textColor);

      if (i === caretLine) {
        const end = Math.min(this.cursorPos, line.endIndex);
        const cx = lx + this.measureWidth(this.text.slice(line.startIndex, end));
        backend.drawRect(cx, ly, Math.max(1, Math.trunc(this.uiScale)), lineBox, textColor);
      }
    }
    backend.popClip();
  }
}
