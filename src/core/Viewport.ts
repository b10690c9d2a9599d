/* Viewport.ts */

// Plot space -> pixel space over the inner drawing area.
// Both share the origin's x and the units; plot y grows upward like the
// axes, screen y grows downward.
export class Viewport {
  readonly innerWidth: number;
  readonly innerHeight: number;

  constructor(innerWidth: number, innerHeight: number) {
    this.innerWidth = innerWidth;
    this.innerHeight = innerHeight;
  }

  yToPixel(y: number): number {
    return this.innerHeight - y;
  }

  toPixel(p: { x: number; y: number }): { x: number; y: number } {
    return { x: p.x, y: this.yToPixel(p.y) };
  }
}
