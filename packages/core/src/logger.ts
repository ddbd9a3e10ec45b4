/**
 * packages/core/src/logger.ts: Logging seam.
 *
 * Core never imports node modules; the default logger resolves `console`
 * through globalThis at call time so hosts without one stay silent.
 */

export type PopupLogger = Readonly<{
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

type ConsoleLike = { warn?: (msg: string) => void; error?: (msg: string) => void };

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
const DEV_MODE = NODE_ENV !== "production";

function globalConsole(): ConsoleLike | undefined {
  return (globalThis as { console?: ConsoleLike }).console;
}

export const consoleLogger: PopupLogger = Object.freeze({
  warn(message: string): void {
    if (!DEV_MODE) return;
    globalConsole()?.warn?.(message);
  },
  error(message: string): void {
    globalConsole()?.error?.(message);
  },
});

export const silentLogger: PopupLogger = Object.freeze({
  warn(): void {},
  error(): void {},
});

/** Prefix a message with the package and area tag, e.g. `[popframe][event]`. */
export function logTag(area: string, message: string): string {
  return `[popframe][${area}] ${message}`;
}
