// src/lib/pipeline.ts
// ------------------------------------------------------------
// One render's worth of plot geometry, in plot space:
//   validate -> resolve config -> select -> (normalize) -> map -> (curve)
//
// Nothing here knows about pixels, SVG or React; the scene builder turns the
// result into drawables.
// ------------------------------------------------------------

import type { FeatureRange, PlotBounds, Point } from "../core/types";
import { createRowPolylineBuilder } from "./curve";
import {
  findColumn,
  numericColumn,
  numericRange,
  rowCount,
  selectColumns,
  type Dataset,
} from "./dataset";
import { mapPoint, mapX } from "./geometry";
import { normalizeValues } from "./normalize";
import { resolvePlotConfig, type PlotAttributes, type PlotConfig } from "./plotConfig";
import { validate } from "./validate";

export type FeatureAxis = {
  name: string;
  label: string;
  index: number;
  // range of the plotted values ([0, 1]-ish when normalized)
  range: FeatureRange;
  x: number;
};

export type RowPolyline = {
  rowIndex: number;
  points: Point[];
  // raw value of the color feature for this row
  colorValue: number;
};

export type PlotGeometry = {
  config: PlotConfig;
  bounds: PlotBounds;
  features: FeatureAxis[];
  polylines: RowPolyline[];
  colorRange: FeatureRange;
};

export function computeGeometry(
  dataset: Dataset | null | undefined,
  attributes: PlotAttributes,
  bounds: PlotBounds,
): PlotGeometry {
  // 1) shape and completeness
  validate(dataset);

  // 2) displayed features, color, legend, labels
  const config = resolvePlotConfig(dataset, attributes);

  // 3) numeric columns of the displayed features, rescaled when asked
  const selected = selectColumns(dataset, config.features);
  const columns: number[][] = selected.columns.map((column) => {
    const values = numericColumn(column);
    return config.normalize ? normalizeValues(values) : values;
  });

  const featureCount = columns.length;
  const features: FeatureAxis[] = [];
  let f = 0;
  while (f < featureCount) {
    features.push({
      name: config.features[f],
      label: config.labels[f],
      index: f,
      range: numericRange(columns[f]),
      x: mapX(f, featureCount, bounds),
    });
    f += 1;
  }

  // 4) colors read the raw column, so the colorbar shows real values
  const colorColumn = findColumn(dataset, config.colorFeature);
  const colorValues = colorColumn ? numericColumn(colorColumn) : [];
  const colorRange = numericRange(colorValues);

  // 5) one polyline per row
  const buildRow = createRowPolylineBuilder(config.curve ? "curved" : "straight", config.curveSteps);
  const rows = rowCount(dataset);
  const polylines: RowPolyline[] = [];
  let r = 0;
  while (r < rows) {
    const anchors: Point[] = [];
    let i = 0;
    while (i < featureCount) {
      anchors.push(
        mapPoint({
          featureIndex: i,
          featureCount,
          value: columns[i][r],
          range: features[i].range,
          bounds,
        }),
      );
      i += 1;
    }
    polylines.push({ rowIndex: r, points: buildRow(anchors), colorValue: colorValues[r] });
    r += 1;
  }

  return { config, bounds, features, polylines, colorRange };
}
