/**
 * packages/core/src/runtime/textEdit.ts: Multi-line text editing.
 *
 * Pure state transition for TextInput: given the current buffer, cursor and
 * selection, apply one key or text event and return the next state.
 *
 * Editing operations:
 *   - Text event: insert at cursor (replacing a non-empty selection)
 *   - Enter: insert a literal newline (replacing a non-empty selection)
 *   - Backspace/Delete: remove the selection, else one code point
 *   - Left/Right: move by one code point and clear the selection
 *   - Home/End: jump to the start/end of the buffer
 *
 * Cursor indices are UTF-16 offsets that never split a surrogate pair.
 */

import type { PopupEvent } from "../events.js";

export type TextEditState = Readonly<{
  value: string;
  cursor: number;
  selectionStart: number | null;
  selectionEnd: number | null;
}>;

export type TextEditResult = Readonly<{
  value: string;
  cursor: number;
  selectionStart: number | null;
  selectionEnd: number | null;
  /** True when `value` differs from the input buffer. */
  changed: boolean;
}>;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

export function clampCursor(value: string, cursor: number): number {
  if (!Number.isFinite(cursor) || cursor < 0) return 0;
  if (cursor > value.length) return value.length;
  const c = Math.trunc(cursor);
  // Never land between the halves of a surrogate pair.
  if (c > 0 && c < value.length && isLowSurrogate(value.charCodeAt(c))) {
    if (isHighSurrogate(value.charCodeAt(c - 1))) return c - 1;
  }
  return c;
}

export function prevBoundary(value: string, cursor: number): number {
  if (cursor <= 0) return 0;
  const prev = cursor - 1;
  if (prev > 0 && isLowSurrogate(value.charCodeAt(prev))) {
    if (isHighSurrogate(value.charCodeAt(prev - 1))) return prev - 1;
  }
  return prev;
}

export function nextBoundary(value: string, cursor: number): number {
  if (cursor >= value.length) return value.length;
  if (isHighSurrogate(value.charCodeAt(cursor)) && cursor + 1 < value.length) {
    if (isLowSurrogate(value.charCodeAt(cursor + 1))) return cursor + 2;
  }
  return cursor + 1;
}

/** Ordered `[min, max)` of a selection, or null when unset or empty. */
export function normalizeSelection(
  value: string,
  selectionStart: number | null,
  selectionEnd: number | null,
): readonly [number, number] | null {
  if (selectionStart === null || selectionEnd === null) return null;
  const a = clampCursor(value, selectionStart);
  const b = clampCursor(value, selectionEnd);
  if (a === b) return null;
  return a < b ? [a, b] : [b, a];
}

function stripCarriageReturns(text: string): string {
  return text.includes("\r") ? text.replace(/\r/g, "") : text;
}

function settled(value: string, cursor: number, changed: boolean): TextEditResult {
  return Object.freeze({ value, cursor, selectionStart: null, selectionEnd: null, changed });
}

/**
 * Apply a key/text event to a text buffer.
 *
 * @returns the next state, or null when the event is not an editing event
 */
export function applyTextEdit(event: PopupEvent, state: TextEditState): TextEditResult | null {
  const value = state.value;
  const cursor = clampCursor(value, state.cursor);
  const selection = normalizeSelection(value, state.selectionStart, state.selectionEnd);

  const insert = (text: string): TextEditResult => {
    if (selection) {
      const [start, end] = selection;
      return settled(value.slice(0, start) + text + value.slice(end), start + text.length, true);
    }
    return settled(value.slice(0, cursor) + text + value.slice(cursor), cursor + text.length, true);
  };

  if (event.kind === "text") {
    const text = stripCarriageReturns(event.text);
    if (text.length === 0) return null;
    return insert(text);
  }

  if (event.kind !== "key" || event.action === "up") return null;

  switch (event.key) {
    case "enter":
      return insert("\n");
    case "backspace": {
      if (selection) return insert("");
      if (cursor === 0) return settled(value, cursor, false);
      const prev = prevBoundary(value, cursor);
      return settled(value.slice(0, prev) + value.slice(cursor), prev, true);
    }
    case "delete": {
      if (selection) return insert("");
      if (cursor >= value.length) return settled(value, cursor, false);
      const next = nextBoundary(value, cursor);
      return settled(value.slice(0, cursor) + value.slice(next), cursor, true);
    }
    case "left":
      return settled(value, prevBoundary(value, cursor), false);
    case "right":
      return settled(value, nextBoundary(value, cursor), false);
    case "home":
      return settled(value, 0, false);
    case "end":
      return settled(value, value.length, false);
    default:
      return null;
  }
}
