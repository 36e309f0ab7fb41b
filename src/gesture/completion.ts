/**
 * Completion test for a released swipe.
 */

import type { GestureDirection } from '../ports/types';
import { clamp } from './session';

export interface CompletionThresholds {
  readonly minimumFlingVelocity: number;
  readonly finishPercent: number;
}

/**
 * Width of a full-window preview that is inside the window when its left
 * edge sits at `previewOffset`.
 */
export function visiblePreviewWidth(previewOffset: number, windowWidth: number): number {
  const visible = previewOffset < 0 ? previewOffset + windowWidth : windowWidth - previewOffset;
  return clamp(visible, 0, windowWidth);
}

export function velocityMatchesDirection(direction: GestureDirection, velocity: number): boolean {
  switch (direction) {
    case 'right-to-left': return velocity <= 0;
    case 'left-to-right': return velocity >= 0;
    case 'top-to-bottom':
    case 'bottom-to-top':
      return true;
  }
}

export function isFling(velocity: number, minimumFlingVelocity: number): boolean {
  return Math.abs(velocity) >= minimumFlingVelocity;
}

/**
 * A swipe completes when it is not a fling against its own direction and
 * either enough of the preview is showing or it was flung.
 */
export function isGestureComplete(
  direction: GestureDirection,
  velocity: number,
  previewOffset: number,
  windowWidth: number,
  thresholds: CompletionThresholds,
): boolean {
  const fling = isFling(velocity, thresholds.minimumFlingVelocity);
  const reverseFling = fling && !velocityMatchesDirection(direction, velocity);
  if (reverseFling) return false;

  const shown = windowWidth > 0 ? visiblePreviewWidth(previewOffset, windowWidth) / windowWidth : 0;
  return shown >= thresholds.finishPercent || fling;
}
