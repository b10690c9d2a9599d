// src/MVC/model/ParallelPlotModel.ts

// ------------------------------------------------------------
// Model:
// 1) holds the state: the dataset and the plot attributes
// 2) delegates the computation to the pure functions in lib/
//
// The model knows nothing about React, SVG or pixels.
// ------------------------------------------------------------

import type { Dataset } from "../../lib/dataset";
import { computeGeometry, type PlotGeometry } from "../../lib/pipeline";
import { resolveAttributes, type PlotAttributes } from "../../lib/plotConfig";
import type { PlotBounds } from "../../core/types";

export type ParallelPlotState = {
  data: Dataset | null;
  attributes: PlotAttributes;
};

export class ParallelPlotModel {
  private state: ParallelPlotState;

  constructor(initial: { data: Dataset | null; attributes?: Partial<PlotAttributes> }) {
    this.state = {
      data: initial.data,
      attributes: resolveAttributes(initial.attributes),
    };
  }

  // snapshot; callers cannot reach the stored attributes
  getState(): Readonly<ParallelPlotState> {
    return { data: this.state.data, attributes: resolveAttributes(this.state.attributes) };
  }

  getData(): Dataset | null {
    return this.state.data;
  }

  getAttributes(): Readonly<PlotAttributes> {
    return resolveAttributes(this.state.attributes);
  }

  // State the model would have after the update, without applying it
  preview(patch: { data?: Dataset | null; attributes?: Partial<PlotAttributes> }): ParallelPlotState {
    let data = this.state.data;
    if (patch.data !== undefined) {
      data = patch.data;
    }
    let attributes = this.state.attributes;
    if (patch.attributes) {
      attributes = resolveAttributes({ ...this.state.attributes, ...patch.attributes });
    }
    return { data, attributes };
  }

  commit(next: ParallelPlotState): void {
    this.state = { data: next.data, attributes: resolveAttributes(next.attributes) };
  }

  computeGeometry(bounds: PlotBounds, state: ParallelPlotState = this.state): PlotGeometry {
    return computeGeometry(state.data, state.attributes, bounds);
  }
}
