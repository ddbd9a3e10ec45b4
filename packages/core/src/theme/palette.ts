/**
 * packages/core/src/theme/palette.ts: Colors and theme roles.
 *
 * Widgets ask the metrics provider for a role; anything it returns that is
 * not a usable color falls back to the built-in palette.
 */

/** RGBA color with channels in [0, 1]. */
export type Rgba = Readonly<{ r: number; g: number; b: number; a: number }>;

export type ThemeRole =
  | "popupBackground"
  | "popupBorder"
  | "titleBar"
  | "titleText"
  | "text"
  | "buttonFill"
  | "buttonHover"
  | "buttonActive"
  | "buttonText"
  | "inputFill"
  | "inputText"
  | "inputSelection"
  | "inputFocusBorder"
  | "progressTrack"
  | "progressFill"
  | "progressText"
  | "progressBorder"
  | "scrollTrack"
  | "scrollThumb"
  | "scrollThumbHover";

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

export function rgba(r: number, g: number, b: number, a = 1): Rgba {
  return Object.freeze({ r: clampUnit(r), g: clampUnit(g), b: clampUnit(b), a: clampUnit(a) });
}

function finiteField(v: object, key: "r" | "g" | "b" | "a"): boolean {
  if (!(key in v)) return false;
  const field: unknown = Reflect.get(v, key);
  return typeof field === "number" && Number.isFinite(field);
}

export function isRgba(v: unknown): v is Rgba {
  if (typeof v !== "object" || v === null) return false;
  return finiteField(v, "r") && finiteField(v, "g") && finiteField(v, "b") && finiteField(v, "a");
}

export const fallbackPalette: Readonly<Record<ThemeRole, Rgba>> = Object.freeze({
  popupBackground: rgba(0.16, 0.16, 0.16, 0.95),
  popupBorder: rgba(0.35, 0.35, 0.35),
  titleBar: rgba(0.24, 0.24, 0.24),
  titleText: rgba(0.92, 0.92, 0.92),
  text: rgba(0.85, 0.85, 0.85),
  buttonFill: rgba(0.33, 0.33, 0.33),
  buttonHover: rgba(0.4, 0.4, 0.4),
  buttonActive: rgba(0.28, 0.45, 0.7),
  buttonText: rgba(0.95, 0.95, 0.95),
  inputFill: rgba(0.11, 0.11, 0.11),
  inputText: rgba(0.9, 0.9, 0.9),
  inputSelection: rgba(0.28, 0.45, 0.7, 0.6),
  inputFocusBorder: rgba(0.3, 0.5, 0.8),
  progressTrack: rgba(0.2, 0.2, 0.2),
  progressFill: rgba(0.28, 0.45, 0.7),
  progressText: rgba(1, 1, 1),
  progressBorder: rgba(0.4, 0.4, 0.4),
  scrollTrack: rgba(0.2, 0.2, 0.2),
  scrollThumb: rgba(0.45, 0.45, 0.45),
  scrollThumbHover: rgba(0.45, 0.45, 0.45, 0.8),
});
