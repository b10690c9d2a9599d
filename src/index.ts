// src/index.ts
// Public entry point.

import { SVG_HEIGHT, SVG_WIDTH } from "./core/layout";
import type { Dataset } from "./lib/dataset";
import type { PlotAttributes } from "./lib/plotConfig";
import { ParallelPlotModel } from "./MVC/model/ParallelPlotModel";
import { ParallelPlotController } from "./MVC/controller/ParallelPlotController";

export { PlotError, isPlotError, type PlotErrorKind } from "./core/errors";
export type { Drawable, SceneOutput } from "./core/drawables";
export type { FeatureRange, PlotBounds, Point } from "./core/types";
export { Viewport } from "./core/Viewport";
export { computePlotBounds } from "./core/layout";

export {
  datasetFromColumns,
  datasetFromRecords,
  type CellValue,
  type DataColumn,
  type Dataset,
} from "./lib/dataset";
export { validate } from "./lib/validate";
export {
  resolveFeatures,
  resolveFeatureLabels,
  resolveLegendVisibility,
  type LegendVisibility,
} from "./lib/features";
export { normalize } from "./lib/normalize";
export { mapPoint, mapX, mapY } from "./lib/geometry";
export { createRowPolylineBuilder, interpolate, interpolateSegment, type CurveMode } from "./lib/curve";
export { COLORMAP_NAMES, createColorScale, type Colormap, type ColormapName } from "./lib/colormap";
export {
  DEFAULT_PLOT_ATTRIBUTES,
  resolveAttributes,
  resolvePlotConfig,
  type PlotAttributes,
  type PlotConfig,
} from "./lib/plotConfig";
export { computeGeometry, type FeatureAxis, type PlotGeometry, type RowPolyline } from "./lib/pipeline";

export { ParallelPlotModel } from "./MVC/model/ParallelPlotModel";
export { ParallelPlotController, type Listener } from "./MVC/controller/ParallelPlotController";
export { ParallelPlotGraphView } from "./MVC/view/ParallelPlotGraphView";
export { ParallelPlotSvg } from "./MVC/view/ParallelPlotSvg";
export { renderSvgMarkup } from "./MVC/view/svgMarkup";
export { default as ParallelPlotApp } from "./app/AppView";

// Controller over a dataset; the first getScene() validates and draws
export function parallelPlot(
  data: Dataset,
  attributes: Partial<PlotAttributes> = {},
  size: { width: number; height: number } = { width: SVG_WIDTH, height: SVG_HEIGHT },
): ParallelPlotController {
  const model = new ParallelPlotModel({ data, attributes });
  return new ParallelPlotController({ model, width: size.width, height: size.height });
}
