// src/lib/dataset.ts
// ------------------------------------------------------------
// Tabular input: named columns of scalar cells.
// Pure helpers, never mutate their input.
// ------------------------------------------------------------

import { PlotError } from "../core/errors";

// null / undefined are missing cells
export type CellValue = number | bigint | boolean | string | Date | null | undefined;

export type DataColumn = {
  name: string;
  values: readonly CellValue[];
};

export type Dataset = {
  columns: readonly DataColumn[];
};

// { height: [...], weight: [...] } -> Dataset, keys in insertion order
export function datasetFromColumns(
  columns: Readonly<Record<string, readonly CellValue[]>>,
): Dataset {
  const out: DataColumn[] = [];
  const names = Object.keys(columns);
  let i = 0;
  while (i < names.length) {
    const name = names[i];
    out.push({ name, values: [...columns[name]] });
    i += 1;
  }
  return { columns: out };
}

// [{ height: 1, weight: 2 }, ...] -> Dataset
// Columns are the union of keys in first-seen order; a key absent
// from a row becomes a missing cell.
export function datasetFromRecords(
  records: readonly Readonly<Record<string, CellValue>>[],
): Dataset {
  const names: string[] = [];
  const seen = new Set<string>();

  let r = 0;
  while (r < records.length) {
    const keys = Object.keys(records[r]);
    let k = 0;
    while (k < keys.length) {
      if (!seen.has(keys[k])) {
        seen.add(keys[k]);
        names.push(keys[k]);
      }
      k += 1;
    }
    r += 1;
  }

  const columns: DataColumn[] = [];
  let c = 0;
  while (c < names.length) {
    const name = names[c];
    const values: CellValue[] = [];
    let row = 0;
    while (row < records.length) {
      values.push(records[row][name]);
      row += 1;
    }
    columns.push({ name, values });
    c += 1;
  }
  return { columns };
}

export function columnNames(dataset: Dataset): string[] {
  return dataset.columns.map((column) => column.name);
}

// Longest column; shorter columns count as having missing tail cells
export function rowCount(dataset: Dataset): number {
  let count = 0;
  let i = 0;
  while (i < dataset.columns.length) {
    const length = dataset.columns[i].values.length;
    if (length > count) {
      count = length;
    }
    i += 1;
  }
  return count;
}

export function findColumn(dataset: Dataset, name: string): DataColumn | undefined {
  return dataset.columns.find((column) => column.name === name);
}

// New dataset holding the named columns in the given order
export function selectColumns(dataset: Dataset, names: readonly string[]): Dataset {
  const columns: DataColumn[] = [];
  let i = 0;
  while (i < names.length) {
    const column = findColumn(dataset, names[i]);
    if (!column) {
      throw new PlotError("UnknownFeature", `Unknown feature "${names[i]}"`, names[i]);
    }
    columns.push(column);
    i += 1;
  }
  return { columns };
}

export function isMissing(value: CellValue): value is null | undefined {
  return value === null || value === undefined;
}

// Numeric view of a cell, or null when it has none
// - booleans are 0/1, Dates epoch milliseconds
// - strings must parse as a finite number
export function toNumber(value: CellValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function numericColumn(column: DataColumn): number[] {
  const out: number[] = [];
  let i = 0;
  while (i < column.values.length) {
    const n = toNumber(column.values[i]);
    if (n === null) {
      throw new PlotError(
        "NonNumericValue",
        `Column "${column.name}" has a non-numeric value at row ${i + 1}: ${String(column.values[i])}`,
        column.name,
      );
    }
    out.push(n);
    i += 1;
  }
  return out;
}

export function numericRange(values: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  let i = 0;
  while (i < values.length) {
    if (values[i] < min) {
      min = values[i];
    }
    if (values[i] > max) {
      max = values[i];
    }
    i += 1;
  }
  if (values.length === 0) {
    return { min: 0, max: 0 };
  }
  return { min, max };
}
