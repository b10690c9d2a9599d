import { describe, it, expect } from "vitest";
import { normalize, normalizeValues } from "../normalize";
import { datasetFromColumns } from "../dataset";

describe("normalize", () => {
  it("rescales a column to [0, 1]", () => {
    expect(normalizeValues([10, 20, 30])).toEqual([0, 0.5, 1]);
  });

  it("maps a constant column to zeros", () => {
    expect(normalizeValues([4, 4, 4])).toEqual([0, 0, 0]);
  });

  it("returns a new dataset and leaves the input alone", () => {
    const ds = datasetFromColumns({ a: [10, 20, 30], b: [0, 5, 10] });
    const out = normalize(ds);
    expect(out.columns.map((c) => c.values)).toEqual([
      [0, 0.5, 1],
      [0, 0.5, 1],
    ]);
    expect(ds.columns[0].values).toEqual([10, 20, 30]);
  });
});
