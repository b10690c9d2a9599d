// src/MVC/view/SvgSceneView.tsx

// ------------------------------------------------------------
// SvgSceneView (renderer)
// - turns scene.drawables (pixel coordinates) into SVG elements
// - no plotting logic, no viewport: it draws what it is given, in order
// ------------------------------------------------------------

import React from "react";

import type { Drawable, SceneOutput, TextDrawable } from "../../core/drawables";

type Props = {
  scene: SceneOutput;
};

export class SvgSceneView extends React.Component<Props> {
  // exhaustiveness check: a new Drawable kind without a branch below
  // fails to compile here
  private assertNever(x: never): never {
    throw new Error("Unhandled drawable: " + JSON.stringify(x));
  }

  private renderText(d: TextDrawable): React.ReactNode {
    const fill = d.fill && d.fill.color ? d.fill.color : "currentColor";

    let transform: string | undefined = undefined;
    if (d.rotate) {
      transform = `rotate(${d.rotate} ${d.pos.x} ${d.pos.y})`;
    }

    return (
      <text
        key={d.id}
        x={d.pos.x}
        y={d.pos.y}
        fontSize={d.fontSize}
        fill={fill}
        textAnchor={d.textAnchor}
        dominantBaseline={d.baseline}
        transform={transform}
      >
        {d.text}
      </text>
    );
  }

  private renderDrawable(d: Drawable): React.ReactNode {
    if (d.kind === "line") {
      const stroke = d.stroke && d.stroke.color ? d.stroke.color : "currentColor";
      const w = d.stroke && d.stroke.width ? d.stroke.width : 1;

      return (
        <line
          key={d.id}
          x1={d.a.x}
          y1={d.a.y}
          x2={d.b.x}
          y2={d.b.y}
          stroke={stroke}
          strokeWidth={w}
        />
      );
    }

    if (d.kind === "polyline") {
      const stroke = d.stroke && d.stroke.color ? d.stroke.color : "currentColor";
      const w = d.stroke && d.stroke.width ? d.stroke.width : 1;
      const opacity = d.stroke ? d.stroke.opacity : undefined;

      const pts = d.points.map((p) => `${p.x},${p.y}`).join(" ");

      return (
        <polyline
          key={d.id}
          points={pts}
          fill="none"
          stroke={stroke}
          strokeWidth={w}
          strokeOpacity={opacity}
        />
      );
    }

    if (d.kind === "text") {
      return this.renderText(d);
    }

    if (d.kind === "rect") {
      const fill = d.fill && d.fill.color ? d.fill.color : "none";
      const stroke = d.stroke && d.stroke.color ? d.stroke.color : undefined;
      const sw = d.stroke && d.stroke.width ? d.stroke.width : undefined;

      return (
        <rect
          key={d.id}
          x={d.pos.x}
          y={d.pos.y}
          width={d.width}
          height={d.height}
          fill={fill}
          stroke={stroke}
          strokeWidth={sw}
        />
      );
    }

    return this.assertNever(d);
  }

  render() {
    const drawables = this.props.scene.drawables;
    const nodes: React.ReactNode[] = [];

    let i = 0;
    while (i < drawables.length) {
      nodes.push(this.renderDrawable(drawables[i]));
      i += 1;
    }

    return <g>{nodes}</g>;
  }
}
