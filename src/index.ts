/**
 * Public entry point.
 */

export { attachToolbarSwipe } from './toolbar-swipe';
export type { ToolbarSwipe, ToolbarSwipeOptions } from './toolbar-swipe';

export * from './adapters';
export { TabPreview } from './components/tab-preview';
export type { ThumbnailResolver } from './components/tab-preview';

export { createGestureConfig, DEFAULT_GESTURE_CONFIG } from './config/gesture-config';
export type { GestureConfig } from './config/gesture-config';

export { classifyDirection, dominantAxis, isHorizontal, rectContains, toolbarHitRect } from './gesture/direction';
export { indexDelta, resolveDestination } from './gesture/destination';
export { isFling, isGestureComplete, visiblePreviewWidth } from './gesture/completion';
export { planSettle } from './gesture/settle-plan';
export type { SettlePlan } from './gesture/settle-plan';
export type { GestureSession, SessionEnvironment } from './gesture/session';

export type { AnimationSpec, IAnimatorPort } from './ports/animator.port';
export type { GestureInsets, IToolbarEnvironmentPort } from './ports/environment.port';
export type { INavigationPort } from './ports/navigation.port';
export type { IContentSurfacePort, ITabPreviewPort } from './ports/surface.port';
export type {
  ISwipeGestureListener,
  RejectReason,
  SettleOutcome,
  ToolbarGestureEvents,
} from './ports/swipe-gesture.port';
export type { ITabStorePort } from './ports/tab-store.port';
export type {
  BrowsingMode,
  Destination,
  GestureDirection,
  LayoutDirection,
  Point,
  Rect,
  TabRef,
  ToolbarPosition,
  TrayPage,
} from './ports/types';

export { GestureConfigError, GestureStateError, ToolbarGestureError } from './utils/errors';
export { logger } from './utils/logger';
export type { LogEntry, LogLevel } from './utils/logger';
export { cubicBezier, linear, linearOutSlowIn } from './utils/easing';
export type { Easing } from './utils/easing';
