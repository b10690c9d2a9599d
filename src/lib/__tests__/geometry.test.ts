import { describe, it, expect } from "vitest";
import { mapPoint, mapX, mapY } from "../geometry";
import type { PlotBounds } from "../../core/types";

const bounds: PlotBounds = { width: 90, height: 90, offset: 5 };

describe("geometry - x placement", () => {
  it("spreads features evenly across the width", () => {
    expect([0, 1, 2].map((i) => mapX(i, 3, bounds))).toEqual([5, 50, 95]);
  });

  it("centers a single feature", () => {
    expect(mapX(0, 1, bounds)).toBe(50);
  });
});

describe("geometry - y placement", () => {
  it("places values linearly within the feature range", () => {
    const range = { min: 10, max: 20 };
    expect(mapY(10, range, bounds)).toBe(5);
    expect(mapY(15, range, bounds)).toBe(50);
    expect(mapY(20, range, bounds)).toBe(95);
  });

  it("puts every value of a degenerate range at mid-height", () => {
    expect(mapY(7, { min: 7, max: 7 }, bounds)).toBe(50);
  });

  it("combines both into a point", () => {
    const p = mapPoint({ featureIndex: 2, featureCount: 3, value: 20, range: { min: 10, max: 20 }, bounds });
    expect(p).toEqual({ x: 95, y: 95 });
  });
});
