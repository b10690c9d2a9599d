/* drawables.ts */
//   - the drawable format (line/polyline/text/rect) the scene builder emits
//   - renderer agnostic: SvgSceneView turns these into SVG elements, but nothing
//     here depends on React or SVG

export type Vec2 = { x: number; y: number };

export type StrokeStyle = {
  width?: number;
  color?: string;
  opacity?: number;
};

export type FillStyle = {
  color?: string;
};

export type LineDrawable = {
  kind: "line";
  id: string;
  a: Vec2;               // endpoints (pixel coordinates)
  b: Vec2;
  stroke?: StrokeStyle;
};

// one data row, or any other chain of points
export type PolylineDrawable = {
  kind: "polyline";
  id: string;
  points: Vec2[];
  stroke?: StrokeStyle;
};

export type TextDrawable = {
  kind: "text";
  id: string;
  pos: Vec2;             // anchor point of <text x= y=>
  text: string;
  fontSize?: number;
  fill?: FillStyle;
  textAnchor?: "start" | "middle" | "end";
  baseline?: "auto" | "middle" | "hanging";
  rotate?: number;       // degrees, around pos
};

// colorbar cells and frame
export type RectDrawable = {
  kind: "rect";
  id: string;
  pos: Vec2;             // top-left corner
  width: number;
  height: number;
  fill?: FillStyle;
  stroke?: StrokeStyle;
};

export type Drawable =
  | LineDrawable
  | PolylineDrawable
  | TextDrawable
  | RectDrawable;

export type SceneOutput = {
  // size of the inner drawing area (pixels, margins excluded)
  width: number;
  height: number;
  title: string;
  drawables: Drawable[];
};
