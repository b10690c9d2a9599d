// src/MVC/controller/ParallelPlotController.ts

// 1) SceneOutput: the drawing data the view consumes
import type { SceneOutput } from "../../core/drawables";

// 2) Viewport: plot space -> pixel space
import type { Viewport } from "../../core/Viewport";

// 3) Model: holds dataset + attributes, delegates computation to lib/
//    - Model: computes
//    - Controller: coordinates (takes updates, rebuilds the scene, notifies views)
//    - View: draws
import { ParallelPlotModel, type ParallelPlotState } from "../model/ParallelPlotModel";

import type { Dataset } from "../../lib/dataset";
import type { PlotGeometry } from "../../lib/pipeline";
import type { PlotAttributes } from "../../lib/plotConfig";
import { ParallelPlotSceneBuilder, type BuildSceneOutput } from "./parallelPlotSceneBuilder";

// 4) Listener: usually a view calling setState({ scene })
export type Listener = (scene: SceneOutput) => void;

type PendingUpdate = {
  data?: Dataset | null;
  attributes?: Partial<PlotAttributes>;
};

export class ParallelPlotController {
  private readonly model: ParallelPlotModel;
  private readonly sceneBuilder: ParallelPlotSceneBuilder;

  private listeners: Listener[];

  // last accepted build; null until someone asks for it
  private lastBuild: BuildSceneOutput | null;

  // updates issued by listeners while they are being notified
  private notifying: boolean;
  private pending: PendingUpdate[];

  constructor(args: {
    model: ParallelPlotModel;
    width?: number;
    height?: number;
  }) {
    this.model = args.model;
    this.sceneBuilder = new ParallelPlotSceneBuilder({
      model: args.model,
      width: args.width,
      height: args.height,
    });

    this.listeners = [];
    this.lastBuild = null;
    this.notifying = false;
    this.pending = [];
  }

  // ------------------------------------------------------
  // subscribe / unsubscribe (views)
  // ------------------------------------------------------
  subscribe(fn: Listener): void {
    this.listeners.push(fn);
  }

  unsubscribe(fn: Listener): void {
    const next: Listener[] = [];
    let i = 0;
    while (i < this.listeners.length) {
      const item = this.listeners[i];
      if (item !== fn) {
        next.push(item);
      }
      i += 1;
    }
    this.listeners = next;
  }

  // ------------------------------------------------------
  // Reads (lazy: the first read builds the scene)
  // Throw PlotError when the current state cannot be drawn.
  // ------------------------------------------------------
  getScene(): SceneOutput {
    return this.ensureBuilt().scene;
  }

  getViewport(): Viewport {
    return this.ensureBuilt().viewport;
  }

  getGeometry(): PlotGeometry {
    return this.ensureBuilt().geometry;
  }

  getState(): Readonly<ParallelPlotState> {
    return this.model.getState();
  }

  // ------------------------------------------------------
  // Updates
  // - the candidate state is built first; on error it throws and nothing
  //   is committed, so the previous scene stays on screen
  // - updates from inside a listener wait until every listener has seen
  //   the current scene; a deferred update that fails is reported by the
  //   outer call once the queue is drained; a throwing listener empties it
  // ------------------------------------------------------
  setData(data: Dataset): void {
    this.update({ data });
  }

  setAttributes(patch: Partial<PlotAttributes>): void {
    this.update({ attributes: patch });
  }

  // data and attributes in one render
  update(patch: PendingUpdate): void {
    if (this.notifying) {
      this.pending.push(patch);
      return;
    }
    try {
      this.applyAndNotify(patch);
    } catch (err) {
      // updates queued by listeners before the failure go with it
      this.pending = [];
      throw err;
    }
    this.drainPending();
  }

  private applyAndNotify(patch: PendingUpdate): void {
    const candidate = this.model.preview(patch);
    // the caller may have changed the dataset in place
    if (patch.data !== undefined) {
      this.sceneBuilder.invalidate();
    }
    const build = this.sceneBuilder.buildScene({ state: candidate });

    this.model.commit(candidate);
    this.lastBuild = build;
    this.notify(build.scene);
  }

  // Queued updates each get a full render of their own, in order.
  // One that fails is dropped; the first failure is rethrown after the
  // queue is empty.
  private drainPending(): void {
    let firstError: unknown = null;
    while (this.pending.length > 0) {
      const next = this.pending.shift();
      if (next) {
        try {
          this.applyAndNotify(next);
        } catch (err) {
          if (firstError === null) {
            firstError = err;
          }
        }
      }
    }
    if (firstError !== null) {
      throw firstError;
    }
  }

  private ensureBuilt(): BuildSceneOutput {
    if (this.lastBuild) {
      return this.lastBuild;
    }
    const build = this.sceneBuilder.buildScene({ state: this.model.getState() });
    this.lastBuild = build;
    return build;
  }

  // notify every listener of the new scene
  private notify(scene: SceneOutput): void {
    this.notifying = true;
    try {
      // copy: a listener may unsubscribe while being notified
      const listeners = [...this.listeners];
      let i = 0;
      while (i < listeners.length) {
        const fn = listeners[i];
        fn(scene);
        i += 1;
      }
    } finally {
      this.notifying = false;
    }
  }
}
