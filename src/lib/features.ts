// src/lib/features.ts
// ------------------------------------------------------------
// Feature Selector
// - which columns become axes, and in which order
// - which column drives the row colors
// - whether the colorbar is drawn
// - what each axis is titled
// ------------------------------------------------------------

import { PlotError } from "../core/errors";
import { columnNames, type Dataset } from "./dataset";

export type LegendVisibility = "auto" | "show" | "hide";

export type ResolvedFeatures = {
  displayed: string[];
  colorFeature: string;
};

export function resolveFeatures(
  dataset: Dataset,
  featureSelection?: readonly string[],
  colorFeature?: string,
): ResolvedFeatures {
  const names = columnNames(dataset);
  const known = new Set(names);

  // 1) displayed features: the selection in its own order, else every column
  let displayed: string[];
  if (featureSelection) {
    if (featureSelection.length === 0) {
      throw new PlotError(
        "InsufficientColumns",
        "Feature selection must name at least one feature",
      );
    }
    const seen = new Set<string>();
    let i = 0;
    while (i < featureSelection.length) {
      const name = featureSelection[i];
      if (!known.has(name)) {
        throw new PlotError("UnknownFeature", `Unknown feature "${name}" in feature selection`, name);
      }
      // one axis per feature
      if (seen.has(name)) {
        throw new PlotError("DuplicateFeature", `Feature "${name}" is selected more than once`, name);
      }
      seen.add(name);
      i += 1;
    }
    displayed = [...featureSelection];
  } else {
    displayed = names;
  }

  // 2) color feature: any dataset column, displayed or not
  let color: string;
  if (colorFeature !== undefined) {
    if (!known.has(colorFeature)) {
      throw new PlotError("UnknownFeature", `Unknown color feature "${colorFeature}"`, colorFeature);
    }
    color = colorFeature;
  } else if (featureSelection) {
    color = displayed[displayed.length - 1];
  } else {
    color = names[names.length - 1];
  }

  return { displayed, colorFeature: color };
}

// auto: draw the colorbar exactly when the color column has no axis of its own
export function resolveLegendVisibility(
  visibility: LegendVisibility,
  colorFeature: string,
  displayed: readonly string[],
): boolean {
  if (visibility === "show") {
    return true;
  }
  if (visibility === "hide") {
    return false;
  }
  return !displayed.includes(colorFeature);
}

export function resolveFeatureLabels(
  labels: readonly string[] | undefined,
  displayed: readonly string[],
): string[] {
  if (!labels) {
    return [...displayed];
  }
  if (labels.length !== displayed.length) {
    throw new PlotError(
      "LabelCountMismatch",
      `Mismatch between feature labels (${labels.length}) and displayed features (${displayed.length})`,
    );
  }
  return [...labels];
}
