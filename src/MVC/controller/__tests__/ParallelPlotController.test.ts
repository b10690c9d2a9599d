import { describe, it, expect, vi } from "vitest";
import { ParallelPlotController } from "../ParallelPlotController";
import { ParallelPlotModel } from "../../model/ParallelPlotModel";
import { datasetFromColumns, type Dataset } from "../../../lib/dataset";
import type { PlotAttributes } from "../../../lib/plotConfig";
import type { SceneOutput } from "../../../core/drawables";
import { PlotError } from "../../../core/errors";

const people = datasetFromColumns({
  height: [160, 170, 180],
  weight: [60, 70, 80],
  age: [20, 30, 40],
});

function createController(data: Dataset | null = people, attributes: Partial<PlotAttributes> = {}) {
  const model = new ParallelPlotModel({ data, attributes });
  return new ParallelPlotController({ model, width: 332, height: 156 });
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("ParallelPlotController - reads", () => {
  it("builds the scene lazily and caches it", () => {
    const controller = createController();
    const scene = controller.getScene();
    expect(controller.getScene()).toBe(scene);
    expect(controller.getGeometry().polylines.length).toBe(3);
    expect(controller.getViewport().innerWidth).toBe(300);
  });

  it("reports invalid initial data on first read", () => {
    const controller = createController(datasetFromColumns({ only: [1, 2] }));
    const err = thrownBy(() => controller.getScene());
    expect(err).toBeInstanceOf(PlotError);
    expect(err).toMatchObject({ kind: "InsufficientColumns" });
  });
});

describe("ParallelPlotController - updates", () => {
  it("notifies subscribers with the new scene", () => {
    const controller = createController();
    const listener = vi.fn();
    controller.subscribe(listener);

    controller.setAttributes({ title: "People" });

    expect(listener).toHaveBeenCalledTimes(1);
    const scene: SceneOutput = listener.mock.calls[0][0];
    expect(scene.title).toBe("People");
    expect(controller.getScene()).toBe(scene);
  });

  it("replaces the dataset", () => {
    const controller = createController();
    controller.setData(datasetFromColumns({ a: [1, 2], b: [3, 4] }));
    expect(controller.getGeometry().features.map((f) => f.name)).toEqual(["a", "b"]);
    expect(controller.getGeometry().polylines.length).toBe(2);
  });

  it("reruns the pipeline when the same dataset is set again after an edit", () => {
    const heights = [160, 170, 180];
    const data: Dataset = {
      columns: [
        { name: "height", values: heights },
        { name: "age", values: [20, 30, 40] },
      ],
    };
    const controller = createController(data);
    expect(controller.getGeometry().features[0].range).toEqual({ min: 160, max: 180 });

    heights[2] = 500;
    controller.setData(data);

    expect(controller.getGeometry().features[0].range).toEqual({ min: 160, max: 500 });
  });

  it("stops notifying after unsubscribe", () => {
    const controller = createController();
    const listener = vi.fn();
    controller.subscribe(listener);
    controller.unsubscribe(listener);
    controller.setAttributes({ curve: true });
    expect(listener).not.toHaveBeenCalled();
  });

  it("commits nothing when an update fails", () => {
    const controller = createController();
    const before = controller.getScene();
    const listener = vi.fn();
    controller.subscribe(listener);

    const err = thrownBy(() => controller.setAttributes({ featureSelection: ["height", "shoe"] }));

    expect(err).toMatchObject({ kind: "UnknownFeature", feature: "shoe" });
    expect(listener).not.toHaveBeenCalled();
    expect(controller.getScene()).toBe(before);
    expect(controller.getState().attributes.featureSelection).toBeUndefined();
  });

  it("applies updates issued during notification after it completes", () => {
    const controller = createController();
    const log: string[] = [];

    controller.subscribe((scene) => {
      log.push("A:" + scene.title);
      if (scene.title === "first") {
        controller.setAttributes({ title: "second" });
      }
    });
    controller.subscribe((scene) => {
      log.push("B:" + scene.title);
    });

    controller.setAttributes({ title: "first" });

    expect(log).toEqual(["A:first", "B:first", "A:second", "B:second"]);
    expect(controller.getScene().title).toBe("second");
  });

  it("reports a failing deferred update once the queue is drained", () => {
    const controller = createController();
    const log: string[] = [];

    controller.subscribe((scene) => {
      log.push(scene.title);
      if (scene.title === "first") {
        controller.setAttributes({ colorFeature: "shoe" });
      }
    });

    const err = thrownBy(() => controller.setAttributes({ title: "first" }));

    expect(err).toMatchObject({ kind: "UnknownFeature" });
    expect(log).toEqual(["first"]);
    expect(controller.getScene().title).toBe("first");
  });

  it("drops updates queued by listeners when a listener throws", () => {
    const controller = createController();
    let queued = false;
    let thrown = false;

    controller.subscribe(() => {
      if (!queued) {
        queued = true;
        controller.setAttributes({ title: "queued" });
      }
    });
    controller.subscribe(() => {
      if (!thrown) {
        thrown = true;
        throw new Error("listener failed");
      }
    });

    expect(() => controller.setAttributes({ title: "first" })).toThrow("listener failed");
    expect(controller.getState().attributes.title).toBe("first");

    controller.setAttributes({ title: "next" });
    expect(controller.getState().attributes.title).toBe("next");
    expect(controller.getScene().title).toBe("next");
  });
});
