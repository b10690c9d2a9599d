import { describe, it, expect } from "vitest";
import { buildAxisDrawables, computeTicks } from "../parallelPlotAxis";
import { Viewport } from "../../../core/Viewport";
import type { FeatureAxis } from "../../../lib/pipeline";

describe("computeTicks", () => {
  it("picks nice ticks inside the range", () => {
    expect(computeTicks({ min: 20, max: 40 })).toEqual([
      { value: 20, label: "20" },
      { value: 25, label: "25" },
      { value: 30, label: "30" },
      { value: 35, label: "35" },
      { value: 40, label: "40" },
    ]);
  });

  it("formats fractional ticks with a shared precision", () => {
    const labels = computeTicks({ min: 0, max: 1 }).map((t) => t.label);
    expect(labels).toEqual(["0.0", "0.2", "0.4", "0.6", "0.8", "1.0"]);
  });

  it("gives a degenerate axis its only value", () => {
    expect(computeTicks({ min: 7, max: 7 })).toEqual([{ value: 7, label: "7" }]);
  });
});

describe("buildAxisDrawables", () => {
  const viewport = new Viewport(100, 100);
  const bounds = { width: 80, height: 80, offset: 10 };
  const axes: FeatureAxis[] = [
    { name: "age", label: "Age", index: 0, range: { min: 20, max: 40 }, x: 10 },
    { name: "weight", label: "Weight", index: 1, range: { min: 20, max: 40 }, x: 90 },
  ];
  const drawables = buildAxisDrawables({ axes, bounds, viewport });

  it("emits a line, five ticks with labels and a title per axis", () => {
    expect(drawables.length).toBe(24);
  });

  it("draws the axis from the bottom to the top of the plot", () => {
    const line = drawables[0];
    if (line.kind !== "line") {
      throw new Error("expected a line");
    }
    expect(line.id).toBe("axis-0");
    expect(line.a.x).toBe(10);
    expect(line.a.y).toBeCloseTo(90, 10);
    expect(line.b.x).toBe(10);
    expect(line.b.y).toBeCloseTo(10, 10);
    expect(line.stroke).toEqual({ color: "#111111", width: 1 });
  });

  it("labels ticks to the left of the axis", () => {
    const label = drawables[2];
    expect(label).toMatchObject({ kind: "text", id: "axis-0-tick-label-0", text: "20", textAnchor: "end" });
    if (label.kind === "text") {
      expect(label.pos.x).toBe(3);
      expect(label.pos.y).toBeCloseTo(90, 10);
    }
  });

  it("centers the title above the axis", () => {
    const title = drawables[11];
    expect(title).toMatchObject({ kind: "text", id: "axis-0-title", text: "Age", textAnchor: "middle" });
    if (title.kind === "text") {
      expect(title.pos.x).toBe(10);
      expect(title.pos.y).toBeCloseTo(2, 10);
    }
  });
});
