/**
 * VelocityTracker — ring buffer of recent pointer samples for release
 * velocity in px/s.
 */

export const VELOCITY_SAMPLE_COUNT = 5;
/** Samples older than this relative to the latest one are ignored */
export const STALE_GAP_MS = 100;

interface VelocitySample {
  x: number;
  y: number;
  time: number;
}

export interface Velocity {
  readonly x: number;
  readonly y: number;
}

export class VelocityTracker {
  private readonly samples: VelocitySample[] = [];
  private index = 0;
  private count = 0;

  constructor() {
    for (let i = 0; i < VELOCITY_SAMPLE_COUNT; i++) {
      this.samples.push({ x: 0, y: 0, time: 0 });
    }
  }

  addSample(x: number, y: number, time: number): void {
    const latest = this.latest();
    // A pause between moves starts a fresh window
    if (latest && time - latest.time > STALE_GAP_MS) {
      this.reset();
    }

    const slot = this.samples[this.index];
    slot.x = x;
    slot.y = y;
    slot.time = time;
    this.index = (this.index + 1) % VELOCITY_SAMPLE_COUNT;
    this.count = Math.min(this.count + 1, VELOCITY_SAMPLE_COUNT);
  }

  reset(): void {
    this.index = 0;
    this.count = 0;
  }

  /**
   * Velocity over the buffered window. Pass the release time so a pointer
   * held still before lifting reads as zero.
   */
  getVelocity(now?: number): Velocity {
    const latest = this.latest();
    if (!latest || this.count < 2) return { x: 0, y: 0 };
    if (now !== undefined && now - latest.time > STALE_GAP_MS) return { x: 0, y: 0 };

    const oldest = this.samples[(this.index - this.count + VELOCITY_SAMPLE_COUNT) % VELOCITY_SAMPLE_COUNT];
    const elapsed = latest.time - oldest.time;
    if (elapsed <= 0) return { x: 0, y: 0 };

    return {
      x: ((latest.x - oldest.x) / elapsed) * 1000,
      y: ((latest.y - oldest.y) / elapsed) * 1000,
    };
  }

  // ── Private ──

  private latest(): VelocitySample | null {
    if (this.count === 0) return null;
    return this.samples[(this.index - 1 + VELOCITY_SAMPLE_COUNT) % VELOCITY_SAMPLE_COUNT];
  }
}
