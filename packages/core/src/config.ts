/**
 * packages/core/src/config.ts: Popup configuration and defaults.
 *
 * Every geometry constant lives here in logical units so a host can tune
 * layout without subclassing widgets.
 */

import { PopupUiError } from "./errors.js";
import { type PopupLogger, consoleLogger } from "./logger.js";

export type PopupConfig = Readonly<{
  /** Horizontal margin and bottom margin around the content stack. */
  margin?: number;
  /** Gap between stacked children and between the title bar and the first child. */
  padding?: number;
  titleHeight?: number;
  scrollbarWidth?: number;
  minThumbSize?: number;
  /** Popup height cap as a fraction of the region height. */
  maxHeightRatio?: number;
  /** Logical units scrolled per wheel notch. */
  wheelStep?: number;
  defaultWidth?: number;
  defaultHeight?: number;
  rowSpacing?: number;
  /** Multiplier applied to the host base font size for body text. */
  fontScale?: number;
  progressFontScale?: number;
  progressRedrawIntervalMs?: number;
  logger?: PopupLogger;
  /** Millisecond clock used for redraw throttling. */
  now?: () => number;
}>;

export type ResolvedPopupConfig = Readonly<{
  margin: number;
  padding: number;
  titleHeight: number;
  scrollbarWidth: number;
  minThumbSize: number;
  maxHeightRatio: number;
  wheelStep: number;
  defaultWidth: number;
  defaultHeight: number;
  rowSpacing: number;
  fontScale: number;
  progressFontScale: number;
  progressRedrawIntervalMs: number;
  logger: PopupLogger;
  now: () => number;
}>;

export const DEFAULT_POPUP_CONFIG: ResolvedPopupConfig = Object.freeze({
  margin: 20,
  padding: 10,
  titleHeight: 45,
  scrollbarWidth: 16,
  minThumbSize: 40,
  maxHeightRatio: 0.75,
  wheelStep: 20,
  defaultWidth: 400,
  defaultHeight: 300,
  rowSpacing: 10,
  fontScale: 1.8,
  progressFontScale: 1.5,
  progressRedrawIntervalMs: 200,
  logger: consoleLogger,
  now: () => Date.now(),
});

function invalidConfig(detail: string): never {
  throw new PopupUiError("POPUP_INVALID_CONFIG", detail);
}

function requirePositive(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0) invalidConfig(`${name} must be a positive finite number`);
  return v;
}

function requireNonNegative(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidConfig(`${name} must be a non-negative finite number`);
  return v;
}

function requireRatio(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0 || v > 1) invalidConfig(`${name} must be in (0, 1]`);
  return v;
}

export function resolvePopupConfig(config: PopupConfig | undefined): ResolvedPopupConfig {
  if (!config) return DEFAULT_POPUP_CONFIG;
  const d = DEFAULT_POPUP_CONFIG;
  const pick = (
    name: keyof ResolvedPopupConfig,
    v: number | undefined,
    fallback: number,
    check: (name: string, v: number) => number,
  ): number => (v === undefined ? fallback : check(name, v));

  return Object.freeze({
    margin: pick("margin", config.margin, d.margin, requireNonNegative),
    padding: pick("padding", config.padding, d.padding, requireNonNegative),
    titleHeight: pick("titleHeight", config.titleHeight, d.titleHeight, requireNonNegative),
    scrollbarWidth: pick(
      "scrollbarWidth",
      config.scrollbarWidth,
      d.scrollbarWidth,
      requirePositive,
    ),
    minThumbSize: pick("minThumbSize", config.minThumbSize, d.minThumbSize, requirePositive),
    maxHeightRatio: pick("maxHeightRatio", config.maxHeightRatio, d.maxHeightRatio, requireRatio),
    wheelStep: pick("wheelStep", config.wheelStep, d.wheelStep, requirePositive),
    defaultWidth: pick("defaultWidth", config.defaultWidth, d.defaultWidth, requirePositive),
    defaultHeight: pick("defaultHeight", config.defaultHeight, d.defaultHeight, requirePositive),
    rowSpacing: pick("rowSpacing", config.rowSpacing, d.rowSpacing, requireNonNegative),
    fontScale: pick("fontScale", config.fontScale, d.fontScale, requirePositive),
    progressFontScale: pick(
      "progressFontScale",
      config.progressFontScale,
      d.progressFontScale,
      requirePositive,
    ),
    progressRedrawIntervalMs: pick(
      "progressRedrawIntervalMs",
      config.progressRedrawIntervalMs,
      d.progressRedrawIntervalMs,
      requireNonNegative,
    ),
    logger: config.logger ?? d.logger,
    now: typeof config.now === "function" ? config.now : d.now,
  });
}
