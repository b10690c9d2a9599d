import { describe, it, expect } from "vitest";
import { isPlotError, PlotError } from "../errors";

describe("PlotError", () => {
  it("carries kind, feature and message", () => {
    const err = new PlotError("UnknownFeature", 'Unknown feature "x"', "x");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("PlotError");
    expect(err.kind).toBe("UnknownFeature");
    expect(err.feature).toBe("x");
    expect(err.message).toBe('Unknown feature "x"');
  });

  it("is recognized by isPlotError", () => {
    expect(isPlotError(new PlotError("NullInput", "no data"))).toBe(true);
    expect(isPlotError(new Error("other"))).toBe(false);
    expect(isPlotError("NullInput")).toBe(false);
  });
});
