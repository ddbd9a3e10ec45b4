/**
 * packages/core/src/errors.ts: Popup runtime error type.
 *
 * Errors carry a stable `code` so hosts can branch on the failure kind
 * without parsing messages.
 */

// =============================================================================
// PopupUiErrorCode Union
// =============================================================================

export type PopupUiErrorCode =
  | "POPUP_HOST_UNAVAILABLE"
  | "POPUP_INVALID_CONFIG"
  | "POPUP_CALLBACK_THROW";

// =============================================================================
// PopupUiError Class
// =============================================================================

export class PopupUiError extends Error {
  override readonly name = "PopupUiError";
  readonly code: PopupUiErrorCode;

  constructor(code: PopupUiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PopupUiError);
    }
  }
}

/** Render a thrown value for log lines. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}
