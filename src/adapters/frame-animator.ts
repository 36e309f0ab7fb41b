/**
 * FrameAnimator — IAnimatorPort driven by animation frames.
 */

import type { AnimationSpec, IAnimatorPort } from '../ports/animator.port';
import { linearOutSlowIn, type Easing } from '../utils/easing';

export type FrameScheduler = (callback: (now: number) => void) => void;

export interface FrameAnimatorOptions {
  /** Defaults to requestAnimationFrame, or a 16ms timer where there is none */
  readonly requestFrame: FrameScheduler;
  readonly easing: Easing;
}

const FALLBACK_FRAME_MS = 16;

function defaultScheduler(): FrameScheduler {
  if (typeof globalThis.requestAnimationFrame === 'function') {
    return (cb) => { globalThis.requestAnimationFrame(cb); };
  }
  return (cb) => { setTimeout(() => cb(performance.now()), FALLBACK_FRAME_MS); };
}

export class FrameAnimator implements IAnimatorPort {
  private readonly requestFrame: FrameScheduler;
  private readonly easing: Easing;

  constructor(options?: Partial<FrameAnimatorOptions>) {
    this.requestFrame = options?.requestFrame ?? defaultScheduler();
    this.easing = options?.easing ?? linearOutSlowIn;
  }

  animate({ from, to, durationMs, onUpdate }: AnimationSpec): Promise<void> {
    if (durationMs <= 0) {
      try {
        onUpdate(to);
        return Promise.resolve();
      } catch (err) {
        return Promise.reject(err);
      }
    }

    return new Promise<void>((resolve, reject) => {
      let startTime: number | null = null;

      const frame = (now: number): void => {
        if (startTime === null) startTime = now;
        const progress = Math.min(1, (now - startTime) / durationMs);
        const value = progress === 1 ? to : from + (to - from) * this.easing(progress);

        try {
          onUpdate(value);
        } catch (err) {
          reject(err);
          return;
        }

        if (progress < 1) {
          this.requestFrame(frame);
        } else {
          resolve();
        }
      };

      this.requestFrame(frame);
    });
  }
}
