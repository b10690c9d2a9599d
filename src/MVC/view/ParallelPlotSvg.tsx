// src/MVC/view/ParallelPlotSvg.tsx

// ------------------------------------------------------------
// The whole <svg>: chart title on top, scene inside the margins.
// Stateless, so the live view and the SVG export render the same markup.
// ------------------------------------------------------------

import React from "react";

import type { SceneOutput } from "../../core/drawables";
import type { Margin } from "../../core/types";
import { SVG_MARGIN, TITLE_FONT_SIZE } from "../../core/layout";
import { SvgSceneView } from "./SvgSceneView";

export type ParallelPlotSvgProps = {
  scene: SceneOutput;
  margin?: Margin;
  // standalone documents need the namespace and a viewBox
  standalone?: boolean;
  svgRef?: React.Ref<SVGSVGElement>;
};

export function ParallelPlotSvg(props: ParallelPlotSvgProps) {
  const { scene, standalone, svgRef } = props;
  const margin = props.margin ? props.margin : SVG_MARGIN;

  const width = scene.width + margin.left + margin.right;
  const height = scene.height + margin.top + margin.bottom;

  return (
    <svg
      ref={svgRef}
      xmlns={standalone ? "http://www.w3.org/2000/svg" : undefined}
      viewBox={standalone ? `0 0 ${width} ${height}` : undefined}
      width={width}
      height={height}
    >
      {scene.title !== "" ? (
        <text
          x={width / 2}
          y={margin.top / 2}
          fontSize={TITLE_FONT_SIZE}
          textAnchor="middle"
          dominantBaseline="middle"
          fill="currentColor"
        >
          {scene.title}
        </text>
      ) : null}
      <g transform={`translate(${margin.left},${margin.top})`}>
        <SvgSceneView scene={scene} />
      </g>
    </svg>
  );
}
