import { describe, it, expect } from "vitest";
import { interpolateViridis } from "d3-scale-chromatic";
import { COLORMAP_NAMES, createColorScale, isColormapName, resolveColormap } from "../colormap";
import { PlotError } from "../../core/errors";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("colormap - named maps", () => {
  it("maps the range ends to the colormap ends", () => {
    const scale = createColorScale("viridis", { min: 20, max: 40 });
    expect(scale(20)).toBe("#440154");
    expect(scale(40)).toBe("#fde725");
  });

  it("clamps values outside the range", () => {
    const scale = createColorScale("viridis", { min: 0, max: 1 });
    expect(scale(-5)).toBe("#440154");
    expect(scale(5)).toBe("#fde725");
  });

  it("uses the middle color for a degenerate range", () => {
    const scale = createColorScale("viridis", { min: 3, max: 3 });
    expect(scale(3)).toBe(interpolateViridis(0.5));
  });

  it("knows every listed name", () => {
    expect(COLORMAP_NAMES.every((name) => isColormapName(name))).toBe(true);
    expect(isColormapName("jet")).toBe(false);
  });
});

describe("colormap - color stops", () => {
  it("blends the stops from first to last", () => {
    const scale = createColorScale(["#000000", "#ffffff"], { min: 0, max: 1 });
    expect(scale(0)).toBe("rgb(0, 0, 0)");
    expect(scale(1)).toBe("rgb(255, 255, 255)");
  });

  it("uses a single stop everywhere", () => {
    expect(resolveColormap(["red"])(0.3)).toBe("red");
  });

  it("rejects an empty stop list", () => {
    const err = thrownBy(() => resolveColormap([]));
    expect(err).toBeInstanceOf(PlotError);
    expect(err).toMatchObject({ kind: "InvalidColormap" });
  });
});
