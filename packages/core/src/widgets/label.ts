import type { DrawingBackend } from "../host.js";
import { toLogical, toPixels } from "../layout/geometry.js";
import {
  LINE_HEIGHT_REFERENCE,
  lineHeightFromGlyphHeight,
  wrapTextSpans,
} from "../layout/textWrap.js";
import type { Rgba } from "../theme/palette.js";
import { Widget } from "./widget.js";

export type LabelOptions = Readonly<{
  /** Base font size before the body text multiplier and UI scale. */
  fontSize?: number;
  color?: Rgba;
}>;

/** Static wrapped text. */
export class Label extends Widget {
  text: string;
  fontSize: number | undefined;
  color: Rgba | undefined;
  /** Wrapped lines for the last width passed to `measure`. */
  lines: readonly string[] = [];
  lineHeight = 0;

  private lastAvailableWidth: number | null = null;

  constructor(text: string, options: LabelOptions = {}) {
    super(0, 0, 100, 30);
    this.text = text;
    this.fontSize = options.fontSize;
    this.color = options.color;
  }

  get fontSizePx(): number {
    return this.fontSizeFor(this.environment().config.fontScale, this.fontSize);
  }

  override measure(availableWidth: number): void {
    this.lastAvailableWidth = availableWidth;
    const scale = this.uiScale;
    const fontSize = this.fontSizePx;
    const measureWidth = (s: string): number => this.measureText(s, fontSize).width;

    const wrapped = wrapTextSpans(this.text, toPixels(availableWidth, scale), measureWidth);
    const lines: string[] = [];
    for (let i = 0; i < wrapped.length; i++) {
      const line = wrapped[i];
      if (line === undefined) continue;
      // Soft-wrapped continuations drop the whitespace that overflowed the
      // previous line; paragraph starts keep their indentation.
      if (i === 0 || wrapped[i - 1]?.endIndex !== line.startIndex) {
        lines.push(line.text);
        continue;
      }
      const display = line.text.trimStart();
      if (display.length > 0) lines.push(display);
    }
    this.lines = lines;
    this.lineHeight = lineHeightFromGlyphHeight(
      this.measureText(LINE_HEIGHT_REFERENCE, fontSize).height,
    );
    this.height = toLogical(this.lines.length * this.lineHeight, scale);
  }

  /**
   * Replace the text. Only plain fields are touched here; the owning popup
   * re-wraps on its next draw.
   */
  update(text: string): void {
    this.text = text;
    this.findPopup()?.markLayoutDirty();
    this.requestRedraw();
  }

  override draw(backend: DrawingBackend): void {
    if (this.lastAvailableWidth === null) this.measure(this.width);
    const fontSize = this.fontSizePx;
    const color = this.color ?? this.themeColor("text");
    const gx = this.globalX;
    const gy = this.globalY;
    for (let i = 0; i < this.lines.length; i++) {
      const line = this.lines[i];
      if (line === undefined || line.length === 0) continue;
      backend.drawText(line, gx, gy + Math.trunc(i * this.lineHeight), fontSize, color);
    }
  }
}
