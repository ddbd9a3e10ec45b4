/**
 * packages/core/src/layout/scrollMath.ts: Scrollbar thumb geometry.
 *
 * All values are logical units along the track axis. Degenerate inputs
 * (no overflow, zero-length track) collapse to a zero offset instead of
 * producing NaN.
 */

import { clamp } from "./geometry.js";

export type ThumbGeometry = Readonly<{ thumbSize: number; thumbPosition: number }>;

export function clampScroll(offset: number, maxScroll: number): number {
  return clamp(offset, 0, Math.max(0, maxScroll));
}

export function computeThumb(
  offset: number,
  maxScroll: number,
  visibleSize: number,
  trackLength: number,
  minThumbSize: number,
): ThumbGeometry {
  const track = Math.max(0, trackLength);
  if (!(maxScroll > 0)) return Object.freeze({ thumbSize: track, thumbPosition: 0 });

  const visible = Math.max(0, visibleSize);
  const proportional = (visible / (visible + maxScroll)) * track;
  const thumbSize = Math.min(track, Math.max(minThumbSize, proportional));
  const thumbPosition = (clampScroll(offset, maxScroll) / maxScroll) * (track - thumbSize);
  return Object.freeze({ thumbSize, thumbPosition });
}

/** Scroll offset for a thumb whose leading edge sits at `position`. */
export function offsetForThumbPosition(
  position: number,
  maxScroll: number,
  trackLength: number,
  thumbSize: number,
): number {
  const travel = trackLength - thumbSize;
  if (!(travel > 0) || !(maxScroll > 0)) return 0;
  const p = clamp(position, 0, travel);
  return clampScroll((p / travel) * maxScroll, maxScroll);
}

/** Offset after dragging the thumb `delta` units from where the drag began. */
export function offsetForThumbDrag(
  startOffset: number,
  delta: number,
  maxScroll: number,
  trackLength: number,
  thumbSize: number,
): number {
  const travel = trackLength - thumbSize;
  if (!(travel > 0) || !(maxScroll > 0)) return 0;
  const startPosition = (clampScroll(startOffset, maxScroll) / maxScroll) * travel;
  return offsetForThumbPosition(startPosition + delta, maxScroll, trackLength, thumbSize);
}

/** Offset that centers the thumb on a track click at `clickPosition`. */
export function offsetForTrackClick(
  clickPosition: number,
  maxScroll: number,
  trackLength: number,
  thumbSize: number,
): number {
  return offsetForThumbPosition(clickPosition - thumbSize / 2, maxScroll, trackLength, thumbSize);
}
