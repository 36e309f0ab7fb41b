/**
 * Barrel exports for the adapter layer.
 */

export { ToolbarGestureHandler } from './toolbar-gesture-handler';
export type { ToolbarGestureDeps, HandlerState } from './toolbar-gesture-handler';
export { PointerSwipeListener } from './pointer-swipe-listener';
export type { PointerSwipeListenerOptions } from './pointer-swipe-listener';
export { FrameAnimator } from './frame-animator';
export type { FrameAnimatorOptions, FrameScheduler } from './frame-animator';
export { ElementContentSurface, DomToolbarEnvironment } from './dom-surface-adapter';
export type { DomToolbarEnvironmentConfig, EnvironmentWindow } from './dom-surface-adapter';
export { InMemoryTabStore } from './in-memory-tab-store-adapter';
export { TypedEventBus } from './event-bus';
