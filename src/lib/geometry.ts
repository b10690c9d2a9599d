// src/lib/geometry.ts
// ------------------------------------------------------------
// Geometry Mapper: (feature index, value, range, bounds) -> plot-space point
// - features are spread evenly across the plot width
// - values are placed linearly along their own axis
// ------------------------------------------------------------

import type { FeatureRange, PlotBounds, Point } from "../core/types";

export function mapX(featureIndex: number, featureCount: number, bounds: PlotBounds): number {
  // a single axis stands in the middle
  if (featureCount <= 1) {
    return bounds.offset + bounds.width / 2;
  }
  return bounds.offset + (featureIndex / (featureCount - 1)) * bounds.width;
}

export function mapY(value: number, range: FeatureRange, bounds: PlotBounds): number {
  const span = range.max - range.min;
  // degenerate range: every value at mid-height
  if (span === 0) {
    return bounds.offset + bounds.height / 2;
  }
  return bounds.offset + ((value - range.min) / span) * bounds.height;
}

export function mapPoint(args: {
  featureIndex: number;
  featureCount: number;
  value: number;
  range: FeatureRange;
  bounds: PlotBounds;
}): Point {
  return {
    x: mapX(args.featureIndex, args.featureCount, args.bounds),
    y: mapY(args.value, args.range, args.bounds),
  };
}
