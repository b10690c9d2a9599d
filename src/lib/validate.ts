// src/lib/validate.ts
// Minimal shape and completeness of a dataset before it is plotted.

import { PlotError } from "../core/errors";
import { isMissing, rowCount, type Dataset } from "./dataset";

export function validate(dataset: Dataset | null | undefined): asserts dataset is Dataset {
  if (dataset === null || dataset === undefined) {
    throw new PlotError("NullInput", "Data cannot be null or undefined");
  }

  const columns = dataset.columns.length;
  if (columns < 2) {
    throw new PlotError(
      "InsufficientColumns",
      `Data must have at least two columns, currently (${columns})`,
    );
  }

  const rows = rowCount(dataset);
  if (rows < 2) {
    throw new PlotError(
      "InsufficientRows",
      `Data must have at least two rows, currently (${rows})`,
    );
  }

  // every index up to the row count: a short column is missing its tail,
  // and a hole in a sparse array reads as undefined
  let c = 0;
  while (c < dataset.columns.length) {
    const column = dataset.columns[c];
    let r = 0;
    while (r < rows) {
      if (isMissing(column.values[r])) {
        throw new PlotError(
          "MissingValues",
          `Data cannot have missing values (column "${column.name}")`,
          column.name,
        );
      }
      r += 1;
    }
    c += 1;
  }
}
