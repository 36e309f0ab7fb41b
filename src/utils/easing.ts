/**
 * CSS-style cubic-bezier timing functions.
 */

export type Easing = (t: number) => number;

const BISECTION_STEPS = 24;

/** Timing function equivalent to CSS `cubic-bezier(x1, y1, x2, y2)`. */
export function cubicBezier(x1: number, y1: number, x2: number, y2: number): Easing {
  const coord = (t: number, p1: number, p2: number): number => {
    const u = 1 - t;
    return 3 * u * u * t * p1 + 3 * u * t * t * p2 + t * t * t;
  };

  return (x: number): number => {
    if (x <= 0) return 0;
    if (x >= 1) return 1;

    // x(t) is monotonic for x1, x2 in [0, 1]
    let lo = 0;
    let hi = 1;
    let t = x;
    for (let i = 0; i < BISECTION_STEPS; i++) {
      t = (lo + hi) / 2;
      if (coord(t, x1, x2) < x) lo = t;
      else hi = t;
    }
    return coord(t, y1, y2);
  };
}

/** Decelerating curve used for surfaces settling into place */
export const linearOutSlowIn: Easing = cubicBezier(0, 0, 0.2, 1);

export const linear: Easing = (t) => t;
