// src/lib/plotConfig.ts
// ------------------------------------------------------------
// Plot attributes (what the caller sets) and PlotConfig (what one render
// actually uses, after defaults and validation).
// ------------------------------------------------------------

import type { Colormap } from "./colormap";
import { DEFAULT_CURVE_STEPS } from "./curve";
import type { Dataset } from "./dataset";
import {
  resolveFeatureLabels,
  resolveFeatures,
  resolveLegendVisibility,
  type LegendVisibility,
} from "./features";

export type PlotAttributes = {
  title: string;
  colormap: Colormap;
  colorFeature?: string;
  featureLabels?: readonly string[];
  featureSelection?: readonly string[];
  curve: boolean;
  curveSteps: number;       // subdivisions per segment in curve mode
  normalize: boolean;
  showColorLegend: LegendVisibility;
};

export const DEFAULT_PLOT_ATTRIBUTES: Readonly<PlotAttributes> = {
  title: "",
  colormap: "viridis",
  curve: false,
  curveSteps: DEFAULT_CURVE_STEPS,
  normalize: false,
  showColorLegend: "auto",
};

// read-only for the duration of one render
export type PlotConfig = {
  readonly features: readonly string[];
  readonly labels: readonly string[];
  readonly colorFeature: string;
  readonly curve: boolean;
  readonly curveSteps: number;
  readonly normalize: boolean;
  readonly showColorLegend: boolean;
  readonly title: string;
  readonly colormap: Colormap;
};

function copyList(list: readonly string[] | undefined): readonly string[] | undefined {
  if (list === undefined) {
    return undefined;
  }
  return [...list];
}

// Fill in defaults; arrays are copied so later edits by the caller do not leak in
export function resolveAttributes(partial: Partial<PlotAttributes> = {}): PlotAttributes {
  const merged: PlotAttributes = { ...DEFAULT_PLOT_ATTRIBUTES, ...partial };

  // an explicit undefined must not wipe a default
  if (merged.title === undefined) {
    merged.title = DEFAULT_PLOT_ATTRIBUTES.title;
  }
  if (merged.colormap === undefined) {
    merged.colormap = DEFAULT_PLOT_ATTRIBUTES.colormap;
  }
  if (merged.curve === undefined) {
    merged.curve = DEFAULT_PLOT_ATTRIBUTES.curve;
  }
  if (merged.curveSteps === undefined) {
    merged.curveSteps = DEFAULT_PLOT_ATTRIBUTES.curveSteps;
  }
  if (merged.normalize === undefined) {
    merged.normalize = DEFAULT_PLOT_ATTRIBUTES.normalize;
  }
  if (merged.showColorLegend === undefined) {
    merged.showColorLegend = DEFAULT_PLOT_ATTRIBUTES.showColorLegend;
  }

  merged.featureLabels = copyList(merged.featureLabels);
  merged.featureSelection = copyList(merged.featureSelection);
  if (typeof merged.colormap !== "string") {
    merged.colormap = [...merged.colormap];
  }
  return merged;
}

export function resolvePlotConfig(dataset: Dataset, attributes: PlotAttributes): PlotConfig {
  const { displayed, colorFeature } = resolveFeatures(
    dataset,
    attributes.featureSelection,
    attributes.colorFeature,
  );

  return {
    features: displayed,
    labels: resolveFeatureLabels(attributes.featureLabels, displayed),
    colorFeature,
    curve: attributes.curve,
    curveSteps: attributes.curveSteps,
    normalize: attributes.normalize,
    showColorLegend: resolveLegendVisibility(attributes.showColorLegend, colorFeature, displayed),
    title: attributes.title,
    colormap: attributes.colormap,
  };
}
