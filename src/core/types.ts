/* types.ts */
//   - shared geometry types used by lib/, the scene builder and the views

export type Point = { x: number; y: number };

export type Margin = {
  top: number;
  right: number;
  bottom: number;
  left: number;
};

// Plot area in plot space: axes run from offset to offset + width (x)
// and from offset to offset + height (y, growing upward)
export type PlotBounds = {
  width: number;
  height: number;
  offset: number;
};

// Closed value interval of one feature; min === max is a degenerate range
export type FeatureRange = {
  min: number;
  max: number;
};
