// src/lib/curve.ts
// ------------------------------------------------------------
// Curve Interpolator
// - cosine easing between two mapped points: flat at both ends, so a row
//   meets each axis horizontally
// - segments are lazy iterables; the row builder picks straight or curved
//   once per render
// ------------------------------------------------------------

import type { Point } from "../core/types";

export const DEFAULT_CURVE_STEPS = 30;

export type CurveMode = "straight" | "curved";

// t = (x - x0) / (x1 - x0) * pi, s = 0.5 - 0.5 cos t, y = y0 + s (y1 - y0)
export function interpolate(x0: number, x1: number, y0: number, y1: number, x: number): number {
  if (x1 === x0) {
    return y0;
  }
  const t = ((x - x0) / (x1 - x0)) * Math.PI;
  const s = 0.5 - 0.5 * Math.cos(t);
  return y0 + s * (y1 - y0);
}

// steps + 1 points from (x0, y0) to (x1, y1), both ends included.
// Iterating again starts over.
export class InterpolatedSegment implements Iterable<Point> {
  private readonly x0: number;
  private readonly x1: number;
  private readonly y0: number;
  private readonly y1: number;
  private readonly steps: number;

  constructor(x0: number, x1: number, y0: number, y1: number, steps: number) {
    this.x0 = x0;
    this.x1 = x1;
    this.y0 = y0;
    this.y1 = y1;
    this.steps = steps;
  }

  get length(): number {
    return this.steps + 1;
  }

  *[Symbol.iterator](): Iterator<Point> {
    let k = 0;
    while (k <= this.steps) {
      // last point pinned to x1 so segments join exactly
      const x = k === this.steps ? this.x1 : this.x0 + ((this.x1 - this.x0) * k) / this.steps;
      yield { x, y: interpolate(this.x0, this.x1, this.y0, this.y1, x) };
      k += 1;
    }
  }
}

export function interpolateSegment(
  x0: number,
  x1: number,
  y0: number,
  y1: number,
  steps: number = DEFAULT_CURVE_STEPS,
): InterpolatedSegment {
  let safeSteps = Math.floor(steps);
  if (!(safeSteps >= 1)) {
    safeSteps = 1;
  }
  return new InterpolatedSegment(x0, x1, y0, y1, safeSteps);
}

// mapped points of one row (one per feature) -> points of its polyline
export type RowPolylineBuilder = (anchors: readonly Point[]) => Point[];

export function createRowPolylineBuilder(
  mode: CurveMode,
  steps: number = DEFAULT_CURVE_STEPS,
): RowPolylineBuilder {
  if (mode === "straight") {
    return (anchors) => anchors.map((p) => ({ x: p.x, y: p.y }));
  }

  return (anchors) => {
    if (anchors.length === 1) {
      return [{ x: anchors[0].x, y: anchors[0].y }];
    }
    // consecutive segments share their join point; it is kept twice
    const points: Point[] = [];
    let i = 1;
    while (i < anchors.length) {
      const a = anchors[i - 1];
      const b = anchors[i];
      for (const p of interpolateSegment(a.x, b.x, a.y, b.y, steps)) {
        points.push(p);
      }
      i += 1;
    }
    return points;
  };
}
