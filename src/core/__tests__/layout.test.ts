import { describe, it, expect } from "vitest";
import { computeInnerAvailSize, computePlotBounds, SVG_MARGIN } from "../layout";

describe("layout", () => {
  it("takes the margins off the SVG size", () => {
    const width = 100 + SVG_MARGIN.left + SVG_MARGIN.right;
    const height = 80 + SVG_MARGIN.top + SVG_MARGIN.bottom;
    expect(computeInnerAvailSize(width, height)).toEqual({ innerWidth: 100, innerHeight: 80 });
  });

  it("never returns a negative size", () => {
    expect(computeInnerAvailSize(0, 0)).toEqual({ innerWidth: 0, innerHeight: 0 });
  });

  it("derives plot bounds from the canvas", () => {
    const bounds = computePlotBounds(200, 100);
    expect(bounds.width).toBeCloseTo(160, 10);
    expect(bounds.height).toBeCloseTo(80, 10);
    expect(bounds.offset).toBeCloseTo(10, 10);
  });
});
