// src/lib/colormap.ts
// ------------------------------------------------------------
// Colormap: scalar in the color range -> CSS color
// - named maps come from d3-scale-chromatic
// - a list of color stops is blended as a uniform B-spline (d3-interpolate)
// ------------------------------------------------------------

import { interpolateRgbBasis } from "d3-interpolate";
import {
  interpolateBlues,
  interpolateCividis,
  interpolateCool,
  interpolateGreens,
  interpolateGreys,
  interpolateInferno,
  interpolateMagma,
  interpolatePlasma,
  interpolateRainbow,
  interpolateReds,
  interpolateSpectral,
  interpolateTurbo,
  interpolateViridis,
  interpolateWarm,
} from "d3-scale-chromatic";

import { PlotError } from "../core/errors";
import type { FeatureRange } from "../core/types";

type Interpolator = (t: number) => string;

const NAMED_COLORMAPS = {
  viridis: interpolateViridis,
  plasma: interpolatePlasma,
  inferno: interpolateInferno,
  magma: interpolateMagma,
  cividis: interpolateCividis,
  turbo: interpolateTurbo,
  warm: interpolateWarm,
  cool: interpolateCool,
  rainbow: interpolateRainbow,
  spectral: interpolateSpectral,
  blues: interpolateBlues,
  reds: interpolateReds,
  greens: interpolateGreens,
  greys: interpolateGreys,
} satisfies Record<string, Interpolator>;

export type ColormapName = keyof typeof NAMED_COLORMAPS;

// a named map, or color stops from low to high
export type Colormap = ColormapName | readonly string[];

export const COLORMAP_NAMES: readonly ColormapName[] = [
  "viridis",
  "plasma",
  "inferno",
  "magma",
  "cividis",
  "turbo",
  "warm",
  "cool",
  "rainbow",
  "spectral",
  "blues",
  "reds",
  "greens",
  "greys",
];

export function isColormapName(value: string): value is ColormapName {
  return Object.prototype.hasOwnProperty.call(NAMED_COLORMAPS, value);
}

// Interpolator over t in [0, 1]
export function resolveColormap(colormap: Colormap): Interpolator {
  if (typeof colormap === "string") {
    if (!isColormapName(colormap)) {
      throw new PlotError("InvalidColormap", `Unknown colormap "${colormap}"`);
    }
    return NAMED_COLORMAPS[colormap];
  }
  if (colormap.length === 0) {
    throw new PlotError("InvalidColormap", "Colormap needs at least one color stop");
  }
  if (colormap.length === 1) {
    const only = colormap[0];
    return () => only;
  }
  return interpolateRgbBasis([...colormap]);
}

export function createColorScale(colormap: Colormap, range: FeatureRange): (value: number) => string {
  const interpolator = resolveColormap(colormap);
  const span = range.max - range.min;

  return (value) => {
    // degenerate range: everything takes the middle color
    if (span === 0) {
      return interpolator(0.5);
    }
    let t = (value - range.min) / span;
    if (t < 0) {
      t = 0;
    }
    if (t > 1) {
      t = 1;
    }
    return interpolator(t);
  };
}
