// src/core/layout.ts
// ------------------------------------------------------------
// Sizes and margins of the SVG in one place, so the app, the graph view,
// the controller and the SVG export all read the same numbers.
// ------------------------------------------------------------

import type { Margin, PlotBounds } from "./types";

export const SVG_WIDTH = 720;
export const SVG_HEIGHT = 440;

export const SVG_MARGIN: Margin = {
  top: 40,      // room for the chart title
  right: 16,
  bottom: 16,
  left: 16,
};

// strip on the right of the plot reserved for the colorbar
export const LEGEND_WIDTH = 90;

// plot bounds inside the available canvas
export const PLOT_WIDTH_RATIO = 0.8;
export const PLOT_HEIGHT_RATIO = 0.8;
export const PLOT_OFFSET_RATIO = 0.1;

export const TITLE_FONT_SIZE = 16;
export const AXIS_TITLE_FONT_SIZE = 12;
export const TICK_FONT_SIZE = 10;
export const TICK_LENGTH = 4;

// Available content size (SVG size minus margins)
export function computeInnerAvailSize(
  width: number = SVG_WIDTH,
  height: number = SVG_HEIGHT,
): { innerWidth: number; innerHeight: number } {
  let innerWidth = width - SVG_MARGIN.left - SVG_MARGIN.right;
  let innerHeight = height - SVG_MARGIN.top - SVG_MARGIN.bottom;
  if (innerWidth < 0) {
    innerWidth = 0;
  }
  if (innerHeight < 0) {
    innerHeight = 0;
  }
  return { innerWidth, innerHeight };
}

// Plot bounds for a canvas: 80% of each dimension, offset by 10% of the
// smaller one
export function computePlotBounds(canvasWidth: number, canvasHeight: number): PlotBounds {
  return {
    width: canvasWidth * PLOT_WIDTH_RATIO,
    height: canvasHeight * PLOT_HEIGHT_RATIO,
    offset: Math.min(canvasWidth, canvasHeight) * PLOT_OFFSET_RATIO,
  };
}
