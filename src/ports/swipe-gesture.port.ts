/**
 * ISwipeGestureListener — contract between a raw touch/pointer recognizer
 * and a component that interprets swipes.
 */

import type { Destination, GestureDirection, Point } from './types';

/** How a settled gesture ended */
export type SettleOutcome =
  | { readonly kind: 'switched-tab'; readonly tabId: string }
  | { readonly kind: 'opened-tray' }
  | { readonly kind: 'opened-new-tab' }
  | { readonly kind: 'canceled' };

export interface ISwipeGestureListener {
  /**
   * Called with the first two samples of a drag. Returning true consumes the
   * gesture; update and finish callbacks only follow an accepted start.
   */
  onSwipeStarted(start: Point, next: Point): boolean;

  /**
   * Called per move with scroll distances (previous position minus current),
   * so a finger moving left yields a positive `distanceX`.
   */
  onSwipeUpdate(distanceX: number, distanceY: number): void;

  /** Called on release with velocities in px/s (positive = right/down). */
  onSwipeFinished(velocityX: number, velocityY: number): Promise<SettleOutcome>;
}

/** Lifecycle events published by a toolbar gesture handler */
export interface ToolbarGestureEvents {
  'gesture:armed': { readonly direction: GestureDirection; readonly destination: Destination };
  'gesture:rejected': { readonly reason: RejectReason };
  'gesture:settled': { readonly direction: GestureDirection; readonly outcome: SettleOutcome };
  'telemetry:toolbar-tab-swipe': undefined;
}

export type RejectReason = 'busy' | 'keyboard-visible' | 'outside-toolbar' | 'below-slop';
