/**
 * packages/core/src/events.ts: Input events delivered by the host.
 *
 * Pointer coordinates are region pixels with Y growing downward. Key and
 * text events are split: `key` carries editing/navigation keys, `text`
 * carries the printable characters a key produced.
 */

export type MouseButton = "left" | "middle" | "right" | "none";

export type MouseKind = "down" | "up" | "move" | "wheel";

export type KeyName =
  | "enter"
  | "escape"
  | "backspace"
  | "delete"
  | "left"
  | "right"
  | "up"
  | "down"
  | "home"
  | "end"
  | "tab"
  | "other";

export type KeyAction = "down" | "up" | "repeat";

export type PopupEvent =
  | Readonly<{
      kind: "mouse";
      mouseKind: MouseKind;
      button: MouseButton;
      x: number;
      y: number;
      /** Wheel notches, positive scrolls content down. Zero for other kinds. */
      wheelY: number;
    }>
  | Readonly<{ kind: "key"; key: KeyName; action: KeyAction }>
  | Readonly<{ kind: "text"; text: string }>;

export type PopupMouseEvent = Extract<PopupEvent, { kind: "mouse" }>;

export type Point = Readonly<{ x: number; y: number }>;

/** True for a left-button press or release of the given kind. */
export function isLeft(event: PopupEvent, mouseKind: "down" | "up"): boolean {
  return event.kind === "mouse" && event.mouseKind === mouseKind && event.button === "left";
}

/** True for key presses, counting auto-repeat. */
export function isKeyPress(event: PopupEvent, key: KeyName): boolean {
  return event.kind === "key" && event.key === key && event.action !== "up";
}
