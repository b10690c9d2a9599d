// src/MVC/view/svgMarkup.ts
// Standalone SVG document for a scene (download, files, server rendering).

import { createElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";

import type { SceneOutput } from "../../core/drawables";
import type { Margin } from "../../core/types";
import { ParallelPlotSvg } from "./ParallelPlotSvg";

export const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>';

export function renderSvgMarkup(scene: SceneOutput, options: { margin?: Margin } = {}): string {
  const body = renderToStaticMarkup(
    createElement(ParallelPlotSvg, { scene, margin: options.margin, standalone: true }),
  );
  return XML_HEADER + "\n" + body;
}
