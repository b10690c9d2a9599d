import { describe, it, expect } from "vitest";
import { buildColorbarDrawables, COLORBAR_CELL_COUNT, COLORBAR_WIDTH } from "../parallelPlotLegend";

describe("buildColorbarDrawables", () => {
  const drawables = buildColorbarDrawables({
    layout: { left: 0, top: 0, bottom: 96 },
    range: { min: 20, max: 40 },
    colorOf: (value) => (value < 30 ? "low" : "high"),
    label: "age",
  });

  it("emits cells, a frame, ticks and a title", () => {
    // 24 cells + frame + 5 ticks (mark and label) + title
    expect(drawables.length).toBe(COLORBAR_CELL_COUNT + 1 + 10 + 1);
  });

  it("stacks cells from the bottom, colored at their middle value", () => {
    expect(drawables[0]).toEqual({
      kind: "rect",
      id: "colorbar-cell-0",
      pos: { x: 0, y: 92 },
      width: COLORBAR_WIDTH,
      height: 4,
      fill: { color: "low" },
    });
    expect(drawables[COLORBAR_CELL_COUNT - 1]).toMatchObject({ pos: { x: 0, y: 0 }, fill: { color: "high" } });
  });

  it("places the highest tick at the top", () => {
    const labels = drawables.filter((d) => d.kind === "text" && d.id.startsWith("colorbar-tick-label"));
    expect(labels.map((d) => (d.kind === "text" ? [d.text, d.pos.y] : null))).toEqual([
      ["20", 96],
      ["25", 72],
      ["30", 48],
      ["35", 24],
      ["40", 0],
    ]);
  });

  it("writes the feature name along the bar", () => {
    expect(drawables[drawables.length - 1]).toMatchObject({
      kind: "text",
      id: "colorbar-title",
      text: "age",
      rotate: -90,
      pos: { y: 48 },
    });
  });
});
