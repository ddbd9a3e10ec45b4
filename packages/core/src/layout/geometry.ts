/**
 * packages/core/src/layout/geometry.ts: Rect math and unit conversion.
 */

export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Inclusive on every edge: adjacent rects both claim their shared pixels. */
export function containsInclusive(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x <= rect.x + rect.w && y >= rect.y && y <= rect.y + rect.h;
}

export function clamp(v: number, min: number, max: number): number {
  if (!Number.isFinite(v)) return min;
  if (v < min) return min;
  if (v > max) return max;
  return v;
}

/** Logical units to device pixels, truncated toward zero. */
export function toPixels(logical: number, scale: number): number {
  return Math.trunc(logical * scale);
}

/** Device pixels to logical units, rounded up to whole units. */
export function toLogical(pixels: number, scale: number): number {
  return Math.ceil(pixels / scale);
}
