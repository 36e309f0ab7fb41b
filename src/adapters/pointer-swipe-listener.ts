/**
 * PointerSwipeListener — feeds DOM pointer events on an element to an
 * ISwipeGestureListener.
 *
 * Tracks a single pointer. Once it has moved past the slop, the first two
 * samples go to `onSwipeStarted`; if accepted, later moves become
 * `onSwipeUpdate` distances and the release becomes `onSwipeFinished` with
 * the tracked velocity.
 */

import type { ISwipeGestureListener } from '../ports/swipe-gesture.port';
import type { Point } from '../ports/types';
import { DEFAULT_GESTURE_CONFIG } from '../config/gesture-config';
import { logger } from '../utils/logger';
import { VelocityTracker } from '../utils/velocity-tracker';

type Phase = 'idle' | 'pending' | 'swiping' | 'ignored';

export interface PointerSwipeListenerOptions {
  /** Movement before the start callback fires */
  readonly touchSlopPx: number;
  /** Pointer types to track */
  readonly pointerTypes: readonly string[];
  /** Millisecond clock for velocity samples */
  readonly now: () => number;
}

const DEFAULT_OPTIONS: PointerSwipeListenerOptions = {
  touchSlopPx: DEFAULT_GESTURE_CONFIG.touchSlopPx,
  pointerTypes: ['touch', 'pen', 'mouse'],
  now: () => performance.now(),
};

export class PointerSwipeListener {
  private readonly opts: PointerSwipeListenerOptions;
  private readonly tracker = new VelocityTracker();

  private phase: Phase = 'idle';
  private pointerId: number | null = null;
  private start: Point = { x: 0, y: 0 };
  private last: Point = { x: 0, y: 0 };
  private attached = false;
  private previousTouchAction = '';

  constructor(
    private readonly element: HTMLElement,
    private readonly listener: ISwipeGestureListener,
    options?: Partial<PointerSwipeListenerOptions>,
  ) {
    this.opts = { ...DEFAULT_OPTIONS, ...options };
  }

  // ── Lifecycle ──

  attach(): void {
    if (this.attached) return;
    this.attached = true;
    // Keep the browser from claiming touch pans and cancelling the pointer
    this.previousTouchAction = this.element.style.touchAction;
    this.element.style.touchAction = 'none';

    this.element.addEventListener('pointerdown', this.onPointerDown);
    this.element.addEventListener('pointermove', this.onPointerMove);
    this.element.addEventListener('pointerup', this.onPointerUp);
    this.element.addEventListener('pointercancel', this.onPointerCancel);
    // A release outside the element still has to end the drag
    this.document.addEventListener('pointerup', this.onPointerUp);
    this.document.addEventListener('pointercancel', this.onPointerCancel);
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.element.style.touchAction = this.previousTouchAction;

    this.element.removeEventListener('pointerdown', this.onPointerDown);
    this.element.removeEventListener('pointermove', this.onPointerMove);
    this.element.removeEventListener('pointerup', this.onPointerUp);
    this.element.removeEventListener('pointercancel', this.onPointerCancel);
    this.document.removeEventListener('pointerup', this.onPointerUp);
    this.document.removeEventListener('pointercancel', this.onPointerCancel);
    this.reset();
  }

  isSwiping(): boolean {
    return this.phase === 'swiping';
  }

  // ── Handlers ──

  private readonly onPointerDown = (event: PointerEvent): void => {
    if (this.phase !== 'idle' || !this.opts.pointerTypes.includes(event.pointerType)) return;

    this.phase = 'pending';
    this.pointerId = event.pointerId;
    this.start = { x: event.clientX, y: event.clientY };
    this.last = this.start;
    this.tracker.reset();
    this.tracker.addSample(event.clientX, event.clientY, this.opts.now());
  };

  private readonly onPointerMove = (event: PointerEvent): void => {
    if (event.pointerId !== this.pointerId) return;
    const point: Point = { x: event.clientX, y: event.clientY };
    this.tracker.addSample(point.x, point.y, this.opts.now());

    switch (this.phase) {
      case 'pending': {
        const moved = Math.hypot(point.x - this.start.x, point.y - this.start.y);
        if (moved <= this.opts.touchSlopPx) return;

        if (this.listener.onSwipeStarted(this.start, point)) {
          this.phase = 'swiping';
          this.last = point;
          this.capture(event.pointerId);
        } else {
          this.phase = 'ignored';
        }
        return;
      }
      case 'swiping':
        this.listener.onSwipeUpdate(this.last.x - point.x, this.last.y - point.y);
        this.last = point;
        return;
      default:
        return;
    }
  };

  private readonly onPointerUp = (event: PointerEvent): void => {
    if (event.pointerId !== this.pointerId) return;
    if (this.phase === 'swiping') {
      const velocity = this.tracker.getVelocity(this.opts.now());
      this.finish(velocity.x, velocity.y);
    }
    this.reset();
  };

  private readonly onPointerCancel = (event: PointerEvent): void => {
    if (event.pointerId !== this.pointerId) return;
    if (this.phase === 'swiping') {
      this.finish(0, 0);
    }
    this.reset();
  };

  // ── Private ──

  private get document(): Document {
    return this.element.ownerDocument;
  }

  private finish(velocityX: number, velocityY: number): void {
    void this.listener.onSwipeFinished(velocityX, velocityY).catch((err: unknown) => {
      logger.error('PointerSwipe', 'Swipe settle failed', {
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  private capture(pointerId: number): void {
    if (typeof this.element.setPointerCapture !== 'function') return;
    try {
      this.element.setPointerCapture(pointerId);
    } catch (err) {
      // Pointer may already be gone (e.g. synthetic events)
      logger.debug('PointerSwipe', 'Pointer capture unavailable', { pointerId, error: String(err) });
    }
  }

  private reset(): void {
    this.phase = 'idle';
    this.pointerId = null;
    this.tracker.reset();
  }
}
