/**
 * packages/core/src/host.ts: Host-facing ports.
 *
 * The host application implements these; core only calls them. All
 * coordinates are device pixels in the region's space, Y growing downward.
 */

import { type Rgba, type ThemeRole, fallbackPalette, isRgba } from "./theme/palette.js";

export type TextExtent = Readonly<{ width: number; height: number }>;

export interface MetricsProvider {
  /** Device pixels per logical unit. */
  getUiScale(): number;
  getBaseFontSize(): number;
  getThemeColor(role: ThemeRole): Rgba;
  measureText(text: string, fontSize: number): TextExtent;
}

/**
 * Immediate-mode drawing surface.
 *
 * `pushClip`/`popClip` must be balanced within a frame; text is positioned
 * by the top-left corner of its line box.
 */
export interface DrawingBackend {
  drawRect(x: number, y: number, w: number, h: number, color: Rgba): void;
  drawRectBorder(x: number, y: number, w: number, h: number, color: Rgba, thickness: number): void;
  pushClip(x: number, y: number, w: number, h: number): void;
  popClip(): void;
  drawText(text: string, x: number, y: number, fontSize: number, color: Rgba): void;
}

/** The drawable area a popup is laid out against. */
export type HostRegion = Readonly<{ width: number; height: number }>;

export function isUsableRegion(region: HostRegion | null | undefined): region is HostRegion {
  if (!region) return false;
  const { width, height } = region;
  return Number.isFinite(width) && Number.isFinite(height) && width > 0 && height > 0;
}

/** Metrics used by widgets that are not attached to a popup. */
export const fallbackMetrics: MetricsProvider = Object.freeze({
  getUiScale: () => 1,
  getBaseFontSize: () => 11,
  getThemeColor: (role: ThemeRole) => fallbackPalette[role],
  measureText: (text: string, fontSize: number): TextExtent => ({
    width: Array.from(text).length * fontSize * 0.5,
    height: fontSize,
  }),
});

/** Clamp a reported UI scale into something usable for layout math. */
export function safeUiScale(metrics: MetricsProvider): number {
  const s = metrics.getUiScale();
  return Number.isFinite(s) && s > 0 ? s : 1;
}

export function safeBaseFontSize(metrics: MetricsProvider): number {
  const s = metrics.getBaseFontSize();
  return Number.isFinite(s) && s > 0 ? s : 11;
}

export function resolveThemeColor(metrics: MetricsProvider, role: ThemeRole): Rgba {
  const c = metrics.getThemeColor(role);
  return isRgba(c) ? c : fallbackPalette[role];
}
