/**
 * Gesture classification: direction from the first displacement and
 * whether a start point falls inside the toolbar's trigger region.
 */

import type { GestureInsets } from '../ports/environment.port';
import type { GestureDirection, Point, Rect, ToolbarPosition } from '../ports/types';

/** Horizontal wins only when strictly dominant; ties go vertical. */
export function classifyDirection(dx: number, dy: number): GestureDirection {
  if (Math.abs(dx) > Math.abs(dy)) {
    return dx < 0 ? 'right-to-left' : 'left-to-right';
  }
  return dy < 0 ? 'bottom-to-top' : 'top-to-bottom';
}

export function isHorizontal(direction: GestureDirection): boolean {
  return direction === 'left-to-right' || direction === 'right-to-left';
}

export type SwipeAxis = 'horizontal' | 'vertical';

/**
 * Which axis the displacement clearly moves along past the slop, or null
 * when it is too short or too diagonal to count as a swipe.
 */
export function dominantAxis(dx: number, dy: number, slop: number): SwipeAxis | null {
  const ax = Math.abs(dx);
  const ay = Math.abs(dy);
  if (ax > slop && ay < ax) return 'horizontal';
  if (ay > slop && ax < ay) return 'vertical';
  return null;
}

/**
 * Toolbar bounds used for hit-testing. A bottom toolbar grows upward by the
 * part of the system gesture area that overlaps it.
 */
export function toolbarHitRect(
  toolbar: Rect,
  position: ToolbarPosition,
  insets: GestureInsets | null,
): Rect {
  if (position !== 'bottom' || !insets) return toolbar;
  return { ...toolbar, top: toolbar.top - (insets.mandatoryGestureBottom - insets.systemBarBottom) };
}

export function rectContains(rect: Rect, point: Point): boolean {
  return point.x >= rect.left && point.x < rect.right && point.y >= rect.top && point.y < rect.bottom;
}
