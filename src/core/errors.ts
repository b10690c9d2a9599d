// src/core/errors.ts
// ------------------------------------------------------------
// PlotError: every failure of the plotting pipeline.
// - thrown synchronously, nothing is drawn for a failed render
// - `kind` lets callers branch without matching on message text
// ------------------------------------------------------------

export type PlotErrorKind =
  | "NullInput"
  | "InsufficientColumns"
  | "InsufficientRows"
  | "MissingValues"
  | "UnknownFeature"
  | "DuplicateFeature"
  | "LabelCountMismatch"
  | "NonNumericValue"
  | "InvalidColormap";

export class PlotError extends Error {
  readonly kind: PlotErrorKind;
  // offending column, for UnknownFeature / DuplicateFeature / NonNumericValue
  readonly feature: string | undefined;

  constructor(kind: PlotErrorKind, message: string, feature?: string) {
    super(message);
    this.name = "PlotError";
    this.kind = kind;
    this.feature = feature;
  }
}

export function isPlotError(value: unknown): value is PlotError {
  return value instanceof PlotError;
}
