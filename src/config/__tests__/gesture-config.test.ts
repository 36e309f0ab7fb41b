import { describe, it, expect } from 'vitest';
import { createGestureConfig, DEFAULT_GESTURE_CONFIG } from '../gesture-config';
import { GestureConfigError, ToolbarGestureError } from '../../utils/errors';

describe('createGestureConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(createGestureConfig()).toEqual(DEFAULT_GESTURE_CONFIG);
    expect(DEFAULT_GESTURE_CONFIG.finishPercent).toBe(0.25);
    expect(DEFAULT_GESTURE_CONFIG.finishedDurationMs).toBe(250);
  });

  it('merges overrides over the defaults', () => {
    const config = createGestureConfig({ previewOffsetPx: 20, canceledDurationMs: 0 });
    expect(config.previewOffsetPx).toBe(20);
    expect(config.canceledDurationMs).toBe(0);
    expect(config.touchSlopPx).toBe(16);
  });

  it('rejects a negative distance', () => {
    expect(() => createGestureConfig({ touchSlopPx: -1 }))
      .toThrow('touchSlopPx must be a non-negative number, got -1');
  });

  it('rejects non-finite values', () => {
    expect(() => createGestureConfig({ minimumFlingVelocity: Number.NaN })).toThrow(GestureConfigError);
    expect(() => createGestureConfig({ finishedDurationMs: Infinity })).toThrow(GestureConfigError);
  });

  it('rejects percentages outside (0, 1]', () => {
    expect(() => createGestureConfig({ finishPercent: 0 })).toThrow('finishPercent must be in (0, 1], got 0');
    expect(() => createGestureConfig({ overscrollHidePercent: 1.5 })).toThrow(GestureConfigError);
    expect(createGestureConfig({ finishPercent: 1 }).finishPercent).toBe(1);
  });

  it('names the offending key', () => {
    try {
      createGestureConfig({ shortAnimationMs: -10 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ToolbarGestureError);
      expect(err instanceof GestureConfigError && err.key).toBe('shortAnimationMs');
    }
  });
});
