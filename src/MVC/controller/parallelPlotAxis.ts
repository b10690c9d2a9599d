// src/MVC/controller/parallelPlotAxis.ts

// ------------------------------------------------------------
// Axis drawables: one vertical line per feature, tick marks, tick labels
// and the axis title above it.
// - tick values come from d3-scale's "nice" ticks over the feature range
// - everything is emitted in pixel space through the viewport
// ------------------------------------------------------------

import { scaleLinear } from "d3-scale";

import type { Drawable } from "../../core/drawables";
import type { FeatureRange, PlotBounds } from "../../core/types";
import type { Viewport } from "../../core/Viewport";
import type { FeatureAxis } from "../../lib/pipeline";
import { mapY } from "../../lib/geometry";
import { AXIS_TITLE_FONT_SIZE, TICK_FONT_SIZE, TICK_LENGTH } from "../../core/layout";

export const AXIS_TICK_COUNT = 5;

const AXIS_COLOR = "#111111";
const AXIS_STROKE_WIDTH = 1;

// gap between the top of an axis and the baseline of its title
const AXIS_TITLE_GAP = 8;
// gap between a tick mark and its label
const TICK_LABEL_GAP = 3;

export type AxisTick = {
  value: number;
  label: string;
};

export function computeTicks(range: FeatureRange, count: number = AXIS_TICK_COUNT): AxisTick[] {
  // degenerate axis: the only value there is
  if (range.min === range.max) {
    return [{ value: range.min, label: String(range.min) }];
  }

  const scale = scaleLinear().domain([range.min, range.max]);
  const format = scale.tickFormat(count);
  return scale.ticks(count).map((value) => ({ value, label: format(value) }));
}

export function buildAxisDrawables(args: {
  axes: readonly FeatureAxis[];
  bounds: PlotBounds;
  viewport: Viewport;
}): Drawable[] {
  const { axes, bounds, viewport } = args;
  const out: Drawable[] = [];

  const bottom = viewport.yToPixel(bounds.offset);
  const top = viewport.yToPixel(bounds.offset + bounds.height);

  let i = 0;
  while (i < axes.length) {
    const axis = axes[i];
    const x = axis.x;

    // 1) axis line
    out.push({
      kind: "line",
      id: `axis-${i}`,
      a: { x, y: bottom },
      b: { x, y: top },
      stroke: { color: AXIS_COLOR, width: AXIS_STROKE_WIDTH },
    });

    // 2) ticks
    const ticks = computeTicks(axis.range);
    let t = 0;
    while (t < ticks.length) {
      const tick = ticks[t];
      const y = viewport.yToPixel(mapY(tick.value, axis.range, bounds));

      out.push({
        kind: "line",
        id: `axis-${i}-tick-${t}`,
        a: { x: x - TICK_LENGTH, y },
        b: { x, y },
        stroke: { color: AXIS_COLOR, width: AXIS_STROKE_WIDTH },
      });
      out.push({
        kind: "text",
        id: `axis-${i}-tick-label-${t}`,
        pos: { x: x - TICK_LENGTH - TICK_LABEL_GAP, y },
        text: tick.label,
        fontSize: TICK_FONT_SIZE,
        fill: { color: AXIS_COLOR },
        textAnchor: "end",
        baseline: "middle",
      });
      t += 1;
    }

    // 3) title, centered above the axis
    out.push({
      kind: "text",
      id: `axis-${i}-title`,
      pos: { x, y: top - AXIS_TITLE_GAP },
      text: axis.label,
      fontSize: AXIS_TITLE_FONT_SIZE,
      fill: { color: AXIS_COLOR },
      textAnchor: "middle",
      baseline: "auto",
    });

    i += 1;
  }

  return out;
}
