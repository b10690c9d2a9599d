// src/MVC/controller/parallelPlotSceneBuilder.ts

// ------------------------------------------------------------
// SceneBuilder: model state + canvas size -> SceneOutput
// - the controller only coordinates; assembling the picture lives here
// - plot geometry (plot space) -> Viewport -> drawables (pixel space)
//
// Two phases:
// - heavy: validation, feature resolution, mapping, curve densification
//   (lib/pipeline); cached while the inputs that shape it stay the same
// - light: colors, axis titles, ticks, chart title, colorbar; rebuilt on
//   every call so presentation changes show up at once
//
// Scope:
// - no UI state, no pointer events, no SVG
// ------------------------------------------------------------

import type { Drawable, SceneOutput } from "../../core/drawables";
import { Viewport } from "../../core/Viewport";
import type { PlotBounds } from "../../core/types";
import { computeInnerAvailSize, computePlotBounds, LEGEND_WIDTH } from "../../core/layout";
import { createColorScale } from "../../lib/colormap";
import type { Dataset } from "../../lib/dataset";
import { resolveFeatureLabels, resolveFeatures, resolveLegendVisibility } from "../../lib/features";
import type { FeatureAxis, PlotGeometry } from "../../lib/pipeline";
import { validate } from "../../lib/validate";
import type { ParallelPlotModel, ParallelPlotState } from "../model/ParallelPlotModel";
import { buildAxisDrawables } from "./parallelPlotAxis";
import { buildColorbarDrawables, colorbarLeft } from "./parallelPlotLegend";

const ROW_STROKE_WIDTH = 1.5;
const ROW_STROKE_OPACITY = 0.8;

export type BuildSceneInput = {
  state: ParallelPlotState;
};

export type BuildSceneOutput = {
  scene: SceneOutput;
  viewport: Viewport;
  geometry: PlotGeometry;
};

// ------------------------------------------------------------
// BuildContext: everything one build passes between its steps
// ------------------------------------------------------------
type BuildContext = {
  state: ParallelPlotState;
  innerWidth: number;
  innerHeight: number;

  // heavy results
  geometry: PlotGeometry | null;
  viewport: Viewport | null;

  // light results
  labels: string[];

  drawables: Drawable[];
};

// ------------------------------------------------------------
// Heavy cache
// - key: dataset identity + the attributes that change the geometry
//   (selection, color feature, curve, steps, normalize, resolved legend
//   visibility, which decides whether the colorbar strip is taken)
// - title / colormap / feature labels are light and do not take part
// ------------------------------------------------------------
type HeavyCache = {
  key: string;
  geometry: PlotGeometry;
  viewport: Viewport;
};

export class ParallelPlotSceneBuilder {
  private readonly model: ParallelPlotModel;
  private readonly innerAvailWidth: number;
  private readonly innerAvailHeight: number;

  private heavyCache: HeavyCache | null;

  // identity stands in for content between two setData calls; the
  // controller calls invalidate() whenever data is set, even the same object
  private readonly datasetIds: WeakMap<Dataset, number>;
  private nextDatasetId: number;

  constructor(args: {
    model: ParallelPlotModel;
    width?: number;    // full SVG size; margins are taken off here
    height?: number;
  }) {
    this.model = args.model;
    const inner = computeInnerAvailSize(args.width, args.height);
    this.innerAvailWidth = inner.innerWidth;
    this.innerAvailHeight = inner.innerHeight;
    this.heavyCache = null;
    this.datasetIds = new WeakMap();
    this.nextDatasetId = 1;
  }

  // drop the cached geometry; the next build runs the whole pipeline
  invalidate(): void {
    this.heavyCache = null;
  }

  // ------------------------------------------------------------
  // buildScene
  // 1) initContext
  // 2) buildHeavyScene (cache hit -> reuse, miss -> recompute)
  // 3) buildLightScene
  // 4) finalize
  // Throws PlotError for invalid state; the cache is left untouched then.
  // ------------------------------------------------------------
  buildScene(args: BuildSceneInput): BuildSceneOutput {
    const context = this.initContext(args);

    this.buildHeavyScene(context);
    this.buildLightScene(context);

    return this.finalize(context);
  }

  private initContext(args: BuildSceneInput): BuildContext {
    return {
      state: args.state,
      innerWidth: this.innerAvailWidth,
      innerHeight: this.innerAvailHeight,
      geometry: null,
      viewport: null,
      labels: [],
      drawables: [],
    };
  }

  private buildHeavyScene(context: BuildContext): void {
    const legendVisible = this.resolveLegendVisible(context.state);
    const key = this.makeHeavyCacheKey(context.state, legendVisible);

    if (this.heavyCache && this.heavyCache.key === key) {
      context.geometry = this.heavyCache.geometry;
      context.viewport = this.heavyCache.viewport;
      return;
    }

    // 1) plot bounds; the colorbar strip comes off the right
    const canvasWidth = legendVisible
      ? Math.max(context.innerWidth - LEGEND_WIDTH, 0)
      : context.innerWidth;
    const bounds: PlotBounds = computePlotBounds(canvasWidth, context.innerHeight);

    // 2) geometry (throws on invalid input)
    const geometry = this.model.computeGeometry(bounds, context.state);

    // 3) plot space covers the whole inner area, y up
    const viewport = new Viewport(context.innerWidth, context.innerHeight);

    context.geometry = geometry;
    context.viewport = viewport;
    this.heavyCache = { key, geometry, viewport };
  }

  // Resolved ahead of the pipeline: the plot bounds depend on it
  private resolveLegendVisible(state: ParallelPlotState): boolean {
    validate(state.data);
    const a = state.attributes;
    const { displayed, colorFeature } = resolveFeatures(state.data, a.featureSelection, a.colorFeature);
    return resolveLegendVisibility(a.showColorLegend, colorFeature, displayed);
  }

  private makeHeavyCacheKey(state: ParallelPlotState, legendVisible: boolean): string {
    const a = state.attributes;
    const parts: string[] = [];

    parts.push(String(this.innerAvailWidth));
    parts.push(String(this.innerAvailHeight));
    parts.push(String(this.datasetId(state.data)));

    parts.push(a.featureSelection ? JSON.stringify(a.featureSelection) : "-");
    parts.push(a.colorFeature === undefined ? "-" : JSON.stringify(a.colorFeature));
    parts.push(String(a.curve));
    parts.push(String(a.curveSteps));
    parts.push(String(a.normalize));
    parts.push(String(legendVisible));

    return parts.join("|");
  }

  private datasetId(data: Dataset | null): number {
    if (data === null) {
      return 0;
    }
    const known = this.datasetIds.get(data);
    if (known !== undefined) {
      return known;
    }
    const id = this.nextDatasetId;
    this.nextDatasetId += 1;
    this.datasetIds.set(data, id);
    return id;
  }

  // ------------------------------------------------------------
  // buildLightScene: back to front
  // 1) rows  2) axes  3) colorbar
  // ------------------------------------------------------------
  private buildLightScene(context: BuildContext): void {
    const geometry = context.geometry;
    const viewport = context.viewport;
    if (!geometry || !viewport) {
      return;
    }
    const attributes = context.state.attributes;

    // labels may have changed without invalidating the geometry
    const labels = resolveFeatureLabels(attributes.featureLabels, geometry.config.features);
    context.labels = labels;
    const axes: FeatureAxis[] = geometry.features.map((axis, i) => ({ ...axis, label: labels[i] }));

    const colorOf = createColorScale(attributes.colormap, geometry.colorRange);

    // 1) one polyline per row
    let r = 0;
    while (r < geometry.polylines.length) {
      const row = geometry.polylines[r];
      context.drawables.push({
        kind: "polyline",
        id: `row-${row.rowIndex}`,
        points: row.points.map((p) => viewport.toPixel(p)),
        stroke: {
          color: colorOf(row.colorValue),
          width: ROW_STROKE_WIDTH,
          opacity: ROW_STROKE_OPACITY,
        },
      });
      r += 1;
    }

    // 2) axes, ticks, titles
    const axisDrawables = buildAxisDrawables({ axes, bounds: geometry.bounds, viewport });
    let i = 0;
    while (i < axisDrawables.length) {
      context.drawables.push(axisDrawables[i]);
      i += 1;
    }

    // 3) colorbar
    if (geometry.config.showColorLegend) {
      const bounds = geometry.bounds;
      const stripLeft = Math.max(context.innerWidth - LEGEND_WIDTH, 0);
      const legend = buildColorbarDrawables({
        layout: {
          left: colorbarLeft(stripLeft),
          top: viewport.yToPixel(bounds.offset + bounds.height),
          bottom: viewport.yToPixel(bounds.offset),
        },
        range: geometry.colorRange,
        colorOf,
        label: geometry.config.colorFeature,
      });
      let j = 0;
      while (j < legend.length) {
        context.drawables.push(legend[j]);
        j += 1;
      }
    }
  }

  private finalize(context: BuildContext): BuildSceneOutput {
    if (!context.geometry || !context.viewport) {
      throw new Error("Scene geometry was not built");
    }
    // cached geometry carries the light attributes of the build that made it
    const labels = context.labels;
    const geometry: PlotGeometry = {
      ...context.geometry,
      features: context.geometry.features.map((axis, i) => ({ ...axis, label: labels[i] })),
      config: {
        ...context.geometry.config,
        title: context.state.attributes.title,
        colormap: context.state.attributes.colormap,
        labels,
      },
    };
    const scene: SceneOutput = {
      width: context.innerWidth,
      height: context.innerHeight,
      title: context.state.attributes.title,
      drawables: context.drawables,
    };
    return { scene, viewport: context.viewport, geometry };
  }
}
