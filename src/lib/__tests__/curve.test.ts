import { describe, it, expect } from "vitest";
import { createRowPolylineBuilder, interpolate, interpolateSegment } from "../curve";

describe("interpolate", () => {
  it("hits the midpoint halfway", () => {
    expect(interpolate(0, 10, 0, 10, 5)).toBeCloseTo(5, 10);
  });

  it("returns the endpoints at the ends", () => {
    expect(interpolate(0, 10, 2, 8, 0)).toBe(2);
    expect(interpolate(0, 10, 2, 8, 10)).toBeCloseTo(8, 10);
  });

  it("returns y0 when both x are equal", () => {
    expect(interpolate(3, 3, 1, 9, 3)).toBe(1);
  });
});

describe("interpolateSegment", () => {
  it("yields steps + 1 points, both ends included", () => {
    const points = [...interpolateSegment(0, 10, 0, 10, 2)];
    expect(points.length).toBe(3);
    expect(points[0]).toEqual({ x: 0, y: 0 });
    expect(points[1].x).toBe(5);
    expect(points[1].y).toBeCloseTo(5, 10);
    expect(points[2]).toEqual({ x: 10, y: 10 });
  });

  it("defaults to 30 subdivisions", () => {
    const segment = interpolateSegment(0, 1, 0, 1);
    expect(segment.length).toBe(31);
    expect([...segment].length).toBe(31);
  });

  it("can be iterated again", () => {
    const segment = interpolateSegment(0, 4, 1, 3, 4);
    expect([...segment]).toEqual([...segment]);
  });
});

describe("createRowPolylineBuilder", () => {
  const anchors = [
    { x: 0, y: 0 },
    { x: 10, y: 10 },
    { x: 20, y: 0 },
  ];

  it("emits one point per feature in straight mode", () => {
    expect(createRowPolylineBuilder("straight")(anchors)).toEqual(anchors);
  });

  it("concatenates segments in curved mode, join points included twice", () => {
    const points = createRowPolylineBuilder("curved", 30)(anchors);
    expect(points.length).toBe(62);
    expect(points[0]).toEqual({ x: 0, y: 0 });
    expect(points[30]).toEqual({ x: 10, y: 10 });
    expect(points[31]).toEqual({ x: 10, y: 10 });
    expect(points[61]).toEqual({ x: 20, y: 0 });
  });

  it("emits the single point of a one-feature row in curved mode", () => {
    expect(createRowPolylineBuilder("curved")([{ x: 5, y: 6 }])).toEqual([{ x: 5, y: 6 }]);
  });
});
