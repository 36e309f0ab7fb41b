/**
 * GestureSession — the value a toolbar swipe carries from start to release.
 *
 * Each update returns a new session; offsets are derived from the previous
 * live offset minus the new distance so clamping at one step carries into
 * the next.
 */

import type {
  BrowsingMode,
  Destination,
  GestureDirection,
  LayoutDirection,
  Point,
  ToolbarPosition,
} from '../ports/types';

/** Host facts frozen when the gesture is armed */
export interface SessionEnvironment {
  readonly windowWidth: number;
  readonly previewOffsetPx: number;
  readonly layoutDirection: LayoutDirection;
  readonly toolbarPosition: ToolbarPosition;
  readonly browsingMode: BrowsingMode;
}

export interface GestureSession {
  readonly direction: GestureDirection;
  readonly start: Point;
  readonly env: SessionEnvironment;
  readonly contentOffset: number;
  readonly previewOffset: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Distance a surface travels to leave the window entirely */
export function travelDistance(env: SessionEnvironment): number {
  return env.windowWidth + env.previewOffsetPx;
}

/**
 * Where the preview sits relative to a given content offset: just past the
 * window edge the swipe pulls it in from.
 */
export function previewOffsetFor(direction: GestureDirection, contentOffset: number, env: SessionEnvironment): number {
  switch (direction) {
    case 'right-to-left': return contentOffset + travelDistance(env);
    case 'left-to-right': return contentOffset - travelDistance(env);
    case 'top-to-bottom':
    case 'bottom-to-top':
      return 0;
  }
}

/** Content offset once a tab switch has fully played out */
export function switchedContentOffset(direction: GestureDirection, env: SessionEnvironment): number {
  switch (direction) {
    case 'right-to-left': return -travelDistance(env);
    case 'left-to-right': return travelDistance(env);
    case 'top-to-bottom':
    case 'bottom-to-top':
      return 0;
  }
}

export function startSession(
  direction: GestureDirection,
  start: Point,
  env: SessionEnvironment,
  contentOffset: number,
  previewOffset: number,
): GestureSession {
  return { direction, start, env, contentOffset, previewOffset };
}

/**
 * Session with the preview parked just outside the content, ready to be
 * dragged in. At arm time the content is at rest (`contentOffset` 0); a
 * preview staged mid-drag sits beside wherever the content has moved to.
 */
export function stagePreview(session: GestureSession, contentOffset = 0): GestureSession {
  return { ...session, previewOffset: previewOffsetFor(session.direction, contentOffset, session.env) };
}

/**
 * Apply one move. `distanceX` is previous minus current pointer x.
 *
 * With a tab to switch to, the content may slide at most one full travel
 * distance off screen and never past its resting position; the preview is
 * clamped the mirrored way. Without one, the content only rubber-bands by
 * `overscrollHidePercent` of its width.
 */
export function applySwipeUpdate(
  session: GestureSession,
  destination: Destination,
  distanceX: number,
  contentWidth: number,
  overscrollHidePercent: number,
): GestureSession {
  const { direction } = session;
  const travel = travelDistance(session.env);
  const nextContent = session.contentOffset - distanceX;
  const nextPreview = session.previewOffset - distanceX;

  switch (destination.kind) {
    case 'tab':
      switch (direction) {
        case 'right-to-left':
          return { ...session, contentOffset: clamp(nextContent, -travel, 0), previewOffset: clamp(nextPreview, 0, travel) };
        case 'left-to-right':
          return { ...session, contentOffset: clamp(nextContent, 0, travel), previewOffset: clamp(nextPreview, -travel, 0) };
        default:
          return { ...session, contentOffset: 0, previewOffset: 0 };
      }
    case 'none': {
      const maxHidden = contentWidth * overscrollHidePercent;
      switch (direction) {
        case 'right-to-left':
          return { ...session, contentOffset: clamp(nextContent, -maxHidden, 0) };
        case 'left-to-right':
          return { ...session, contentOffset: clamp(nextContent, 0, maxHidden) };
        default:
          return { ...session, contentOffset: 0 };
      }
    }
    case 'tray':
      return session;
  }
}
