/**
 * Gesture tuning values. Distances are in CSS pixels, velocities in px/s.
 */

import { GestureConfigError } from '../utils/errors';

export type GestureConfig = {
  /** Distance a pointer must travel before a drag counts as a swipe */
  readonly touchSlopPx: number;
  /** Release speed at which a drag counts as a fling */
  readonly minimumFlingVelocity: number;
  /** Gap between the content and the preview while both are on screen */
  readonly previewOffsetPx: number;
  /** Visible share of the preview needed to finish a tab switch */
  readonly finishPercent: number;
  /** Share of the content that may slide away when there is no tab to switch to */
  readonly overscrollHidePercent: number;
  readonly finishedDurationMs: number;
  readonly canceledDurationMs: number;
  readonly canceledFlingDurationMs: number;
  /** Preview fade-out after a tab switch */
  readonly shortAnimationMs: number;
};

export const DEFAULT_GESTURE_CONFIG: GestureConfig = {
  touchSlopPx: 16,
  minimumFlingVelocity: 50,
  previewOffsetPx: 48,
  finishPercent: 0.25,
  overscrollHidePercent: 0.2,
  finishedDurationMs: 250,
  canceledDurationMs: 200,
  canceledFlingDurationMs: 150,
  shortAnimationMs: 200,
};

const PERCENT_KEYS: ReadonlySet<string> = new Set([
  'finishPercent',
  'overscrollHidePercent',
]);

export function createGestureConfig(overrides?: Partial<GestureConfig>): GestureConfig {
  const config: GestureConfig = { ...DEFAULT_GESTURE_CONFIG, ...overrides };

  for (const [key, value] of Object.entries(config)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new GestureConfigError(`${key} must be a non-negative number, got ${value}`, key);
    }
    if (PERCENT_KEYS.has(key) && (value === 0 || value > 1)) {
      throw new GestureConfigError(`${key} must be in (0, 1], got ${value}`, key);
    }
  }

  return config;
}
