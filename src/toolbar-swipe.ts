/**
 * attachToolbarSwipe — wires a DOM toolbar, content element and
 * <tab-preview> to a ToolbarGestureHandler fed by pointer events.
 */

import type { IAnimatorPort } from './ports/animator.port';
import type { GestureInsets } from './ports/environment.port';
import type { INavigationPort } from './ports/navigation.port';
import type { ToolbarGestureEvents } from './ports/swipe-gesture.port';
import type { ITabStorePort } from './ports/tab-store.port';
import type { BrowsingMode, ToolbarPosition } from './ports/types';
import type { TabPreview } from './components/tab-preview';
import { createGestureConfig, type GestureConfig } from './config/gesture-config';
import { DomToolbarEnvironment, ElementContentSurface } from './adapters/dom-surface-adapter';
import { TypedEventBus } from './adapters/event-bus';
import { FrameAnimator } from './adapters/frame-animator';
import { PointerSwipeListener } from './adapters/pointer-swipe-listener';
import { ToolbarGestureHandler } from './adapters/toolbar-gesture-handler';
import { logger } from './utils/logger';

export interface ToolbarSwipeOptions {
  readonly toolbar: HTMLElement;
  readonly content: HTMLElement;
  readonly preview: TabPreview;
  readonly tabs: ITabStorePort;
  readonly navigation: INavigationPort;
  readonly toolbarPosition: ToolbarPosition;
  readonly getBrowsingMode: () => BrowsingMode;
  readonly getInsets?: () => GestureInsets | null;
  /**
   * Element that receives pointer events. Defaults to the toolbar; pass a
   * larger ancestor when insets extend the trigger area past it.
   */
  readonly gestureTarget?: HTMLElement;
  readonly config?: Partial<GestureConfig>;
  readonly events?: TypedEventBus<ToolbarGestureEvents>;
  readonly animator?: IAnimatorPort;
}

export interface ToolbarSwipe {
  readonly handler: ToolbarGestureHandler;
  readonly listener: PointerSwipeListener;
  /** Stop listening for pointer events */
  dispose(): void;
}

export function attachToolbarSwipe(options: ToolbarSwipeOptions): ToolbarSwipe {
  const config = createGestureConfig(options.config);
  const animator = options.animator ?? new FrameAnimator();
  options.preview.animator = animator;

  const handler = new ToolbarGestureHandler({
    content: new ElementContentSurface(options.content),
    preview: options.preview,
    tabs: options.tabs,
    navigation: options.navigation,
    environment: new DomToolbarEnvironment({
      toolbar: options.toolbar,
      toolbarPosition: options.toolbarPosition,
      getBrowsingMode: options.getBrowsingMode,
      getInsets: options.getInsets,
    }),
    animator,
    events: options.events,
    config,
  });

  const listener = new PointerSwipeListener(options.gestureTarget ?? options.toolbar, handler, {
    touchSlopPx: config.touchSlopPx,
  });
  listener.attach();
  logger.info('ToolbarSwipe', 'Attached', { toolbarPosition: options.toolbarPosition });

  return {
    handler,
    listener,
    dispose: () => {
      listener.detach();
      logger.info('ToolbarSwipe', 'Detached');
    },
  };
}
