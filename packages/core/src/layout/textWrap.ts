/**
 * packages/core/src/layout/textWrap.ts: Span-tracked greedy text wrapping.
 *
 * Every wrapped line remembers where it came from in the source text, so a
 * pointer position or a cursor index can be mapped between screen and
 * buffer. Lines tile the source: concatenating `text.slice(startIndex,
 * nextIndex)` over all lines yields the input unchanged.
 *
 *   - Paragraphs split on `\n`; an empty paragraph still yields one line
 *   - Whitespace runs are kept as tokens (nothing is collapsed)
 *   - Tokens wider than the line are hard-broken at code point boundaries
 */

export type MeasureWidth = (text: string) => number;

export type WrappedLine = Readonly<{
  text: string;
  /** Offset of the first character of the line. */
  startIndex: number;
  /** Exclusive end of the visible text; never includes the `\n`. */
  endIndex: number;
  /** Where the following line starts (past the `\n` for a hard break). */
  nextIndex: number;
}>;

const TOKEN_RE = /\S+|\s+/g;

/** Line height multiplier applied to the measured height of the reference glyphs. */
export const LINE_HEIGHT_FACTOR = 1.5;
export const LINE_HEIGHT_REFERENCE = "Hg";

export function lineHeightFromGlyphHeight(glyphHeight: number): number {
  return glyphHeight * LINE_HEIGHT_FACTOR;
}

/**
 * Split a token into the longest code point runs that fit `maxWidth`.
 * Each run holds at least one code point, so a glyph wider than the line
 * still makes progress.
 */
export function splitTokenByWidth(
  token: string,
  maxWidth: number,
  measure: MeasureWidth,
): readonly string[] {
  const cps = Array.from(token);
  const chunks: string[] = [];
  let start = 0;
  while (start < cps.length) {
    let end = start + 1;
    while (end < cps.length && measure(cps.slice(start, end + 1).join("")) <= maxWidth) {
      end++;
    }
    chunks.push(cps.slice(start, end).join(""));
    start = end;
  }
  return chunks;
}

type Span = { startIndex: number; endIndex: number };

function wrapParagraph(
  paragraph: string,
  offset: number,
  maxWidth: number,
  measure: MeasureWidth,
): Span[] {
  const spans: Span[] = [];
  let lineStart = 0;
  let lineLen = 0;
  let lineWidth = 0;

  const flush = (): void => {
    spans.push({ startIndex: offset + lineStart, endIndex: offset + lineStart + lineLen });
    lineStart += lineLen;
    lineLen = 0;
    lineWidth = 0;
  };

  const tokens = paragraph.match(TOKEN_RE) ?? [];
  for (const token of tokens) {
    const tokenWidth = measure(token);
    if (tokenWidth > maxWidth) {
      if (lineLen > 0) flush();
      for (const chunk of splitTokenByWidth(token, maxWidth, measure)) {
        const chunkWidth = measure(chunk);
        if (lineLen > 0 && lineWidth + chunkWidth > maxWidth) flush();
        lineLen += chunk.length;
        lineWidth += chunkWidth;
      }
      continue;
    }

    if (lineLen > 0 && lineWidth + tokenWidth > maxWidth) flush();
    lineLen += token.length;
    lineWidth += tokenWidth;
  }

  if (lineLen > 0 || spans.length === 0) flush();
  return spans;
}

export function wrapTextSpans(
  text: string,
  maxWidth: number,
  measure: MeasureWidth,
): readonly WrappedLine[] {
  const lines: WrappedLine[] = [];
  const paragraphs = text.split("\n");
  let offset = 0;

  for (let p = 0; p < paragraphs.length; p++) {
    const paragraph = paragraphs[p] ?? "";
    const spans = wrapParagraph(paragraph, offset, maxWidth, measure);
    const hardBreak = p < paragraphs.length - 1;

    for (let i = 0; i < spans.length; i++) {
      const span = spans[i];
      if (span === undefined) continue;
      const isLast = i === spans.length - 1;
      let nextIndex = span.endIndex;
      if (isLast && hardBreak) nextIndex = span.endIndex + 1;
      lines.push(
        Object.freeze({
          text: text.slice(span.startIndex, span.endIndex),
          startIndex: span.startIndex,
          endIndex: span.endIndex,
          nextIndex,
        }),
      );
    }

    offset += paragraph.length + 1;
  }

  return Object.freeze(lines);
}

/** Index of the line that owns `cursor`; the last line owns the end of text. */
export function lineIndexForCursor(lines: readonly WrappedLine[], cursor: number): number {
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line !== undefined && cursor >= line.startIndex && cursor < line.nextIndex) return i;
  }
  return Math.max(0, lines.length - 1);
}
