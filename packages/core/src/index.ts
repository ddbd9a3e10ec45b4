/**
 * @popframe/core
 *
 * Runtime-agnostic retained widget engine for modal popups drawn inside a
 * host viewport. This package MUST NOT use Node-specific APIs (node:* imports).
 */

// =============================================================================
// Errors, logging, configuration
// =============================================================================

export { PopupUiError, type PopupUiErrorCode, describeThrown } from "./errors.js";
export { type PopupLogger, consoleLogger, logTag, silentLogger } from "./logger.js";
export {
  DEFAULT_POPUP_CONFIG,
  type PopupConfig,
  type ResolvedPopupConfig,
  resolvePopupConfig,
} from "./config.js";

// =============================================================================
// Host ports and events
// =============================================================================

export {
  type DrawingBackend,
  type HostRegion,
  type MetricsProvider,
  type TextExtent,
  fallbackMetrics,
  isUsableRegion,
  resolveThemeColor,
} from "./host.js";
export type {
  KeyAction,
  KeyName,
  MouseButton,
  MouseKind,
  Point,
  PopupEvent,
  PopupMouseEvent,
} from "./events.js";
export {
  NOOP_REDRAW,
  type RedrawPort,
  type ScheduleOnUiThread,
  createDeferredRedrawPort,
  createImmediateRedrawPort,
} from "./runtime/redraw.js";
export { type Rgba, type ThemeRole, fallbackPalette, rgba } from "./theme/palette.js";

// =============================================================================
// Layout helpers
// =============================================================================

export { type Rect, containsInclusive, toLogical, toPixels } from "./layout/geometry.js";
export {
  type MeasureWidth,
  type WrappedLine,
  lineIndexForCursor,
  splitTokenByWidth,
  wrapTextSpans,
} from "./layout/textWrap.js";
export {
  clampScroll,
  computeThumb,
  offsetForThumbDrag,
  offsetForThumbPosition,
  offsetForTrackClick,
} from "./layout/scrollMath.js";
export { type TextEditResult, type TextEditState, applyTextEdit } from "./runtime/textEdit.js";

// =============================================================================
// Widgets
// =============================================================================

export { DETACHED_ENVIRONMENT, Widget, type WidgetEnvironment } from "./widgets/widget.js";
export { Label, type LabelOptions } from "./widgets/label.js";
export { Button, type ButtonCallback, isCloseLabel } from "./widgets/button.js";
export { TextInput } from "./widgets/textInput.js";
export {
  ProgressBar,
  type ProgressBarOptions,
  fitTextFromEnd,
  progressPercent,
} from "./widgets/progressBar.js";
export { Row } from "./widgets/row.js";
export { Scrollbar, type ScrollOrientation, type ScrollbarOptions } from "./widgets/scrollbar.js";
export { Popup, type PopupOptions } from "./widgets/popup.js";
export { WidgetBuilder } from "./widgets/builder.js";

// =============================================================================
// Session management
// =============================================================================

export {
  type CloseReason,
  type ModalEventOutcome,
  PopupManager,
  type PopupManagerOptions,
  type PopupHost,
  type ShowResult,
} from "./manager/popupManager.js";
