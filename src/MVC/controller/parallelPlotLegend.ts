// src/MVC/controller/parallelPlotLegend.ts

// ------------------------------------------------------------
// Colorbar in the strip to the right of the plot:
// stacked color cells (low at the bottom), a frame, ticks on the right
// and the color feature's name written along it.
// ------------------------------------------------------------

import type { Drawable } from "../../core/drawables";
import type { FeatureRange } from "../../core/types";
import { AXIS_TITLE_FONT_SIZE, TICK_FONT_SIZE, TICK_LENGTH } from "../../core/layout";
import { computeTicks } from "./parallelPlotAxis";

export const COLORBAR_CELL_COUNT = 24;
export const COLORBAR_WIDTH = 14;

// distance from the left edge of the legend strip to the bar
const COLORBAR_INSET = 12;
// distance from the bar's right edge to the rotated title
const COLORBAR_TITLE_GAP = 52;

const FRAME_COLOR = "#111111";

export type ColorbarLayout = {
  left: number;     // pixel x of the bar's left edge
  top: number;      // pixel y of the top (max) end
  bottom: number;   // pixel y of the bottom (min) end
};

export function colorbarLeft(stripLeft: number): number {
  return stripLeft + COLORBAR_INSET;
}

export function buildColorbarDrawables(args: {
  layout: ColorbarLayout;
  range: FeatureRange;
  colorOf: (value: number) => string;
  label: string;
}): Drawable[] {
  const { layout, range, colorOf, label } = args;
  const out: Drawable[] = [];

  const barHeight = layout.bottom - layout.top;
  const cellHeight = barHeight / COLORBAR_CELL_COUNT;
  const span = range.max - range.min;
  const right = layout.left + COLORBAR_WIDTH;

  // 1) cells, bottom to top; each takes the color at its middle value
  let c = 0;
  while (c < COLORBAR_CELL_COUNT) {
    const value = range.min + (span * (c + 0.5)) / COLORBAR_CELL_COUNT;
    out.push({
      kind: "rect",
      id: `colorbar-cell-${c}`,
      pos: { x: layout.left, y: layout.bottom - (c + 1) * cellHeight },
      width: COLORBAR_WIDTH,
      height: cellHeight,
      fill: { color: colorOf(value) },
    });
    c += 1;
  }

  // 2) frame
  out.push({
    kind: "rect",
    id: "colorbar-frame",
    pos: { x: layout.left, y: layout.top },
    width: COLORBAR_WIDTH,
    height: barHeight,
    stroke: { color: FRAME_COLOR, width: 1 },
  });

  // 3) ticks
  const ticks = computeTicks(range);
  let t = 0;
  while (t < ticks.length) {
    const tick = ticks[t];
    let y = layout.top + barHeight / 2;
    if (span !== 0) {
      y = layout.bottom - ((tick.value - range.min) / span) * barHeight;
    }
    out.push({
      kind: "line",
      id: `colorbar-tick-${t}`,
      a: { x: right, y },
      b: { x: right + TICK_LENGTH, y },
      stroke: { color: FRAME_COLOR, width: 1 },
    });
    out.push({
      kind: "text",
      id: `colorbar-tick-label-${t}`,
      pos: { x: right + TICK_LENGTH + 2, y },
      text: tick.label,
      fontSize: TICK_FONT_SIZE,
      fill: { color: FRAME_COLOR },
      textAnchor: "start",
      baseline: "middle",
    });
    t += 1;
  }

  // 4) title, reading bottom to top
  out.push({
    kind: "text",
    id: "colorbar-title",
    pos: { x: right + COLORBAR_TITLE_GAP, y: layout.top + barHeight / 2 },
    text: label,
    fontSize: AXIS_TITLE_FONT_SIZE,
    fill: { color: FRAME_COLOR },
    textAnchor: "middle",
    baseline: "middle",
    rotate: -90,
  });

  return out;
}
