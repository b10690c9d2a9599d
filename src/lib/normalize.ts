// src/lib/normalize.ts
// Min-max rescaling of every column to [0, 1].

import { numericColumn, numericRange, type DataColumn, type Dataset } from "./dataset";

export function normalizeValues(values: readonly number[]): number[] {
  const { min, max } = numericRange(values);
  const span = max - min;

  // degenerate column: nothing to spread, everything sits at 0
  if (span === 0) {
    return values.map(() => 0);
  }
  return values.map((v) => (v - min) / span);
}

export function normalize(dataset: Dataset): Dataset {
  const columns: DataColumn[] = dataset.columns.map((column) => ({
    name: column.name,
    values: normalizeValues(numericColumn(column)),
  }));
  return { columns };
}
