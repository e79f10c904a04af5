import type { Point } from "@surfloop/shared";

export type Viewport = {
  width: number;
  height: number;
  devicePixelRatio: number;
};

function clamp(value: number, max: number): number {
  return Math.max(0, Math.min(Math.max(0, max - 1), value));
}

/**
 * Maps a model coordinate into CSS pixels. Points past the viewport are assumed
 * to be device pixels and divided by the pixel ratio; the result is clamped to
 * [0, dimension - 1]. Points already inside the viewport pass through unchanged.
 */
export function normalizePoint(point: Point, viewport: Viewport): Point {
  const dpr = viewport.devicePixelRatio > 0 ? viewport.devicePixelRatio : 1;
  let { x, y } = point;
  if (x > viewport.width || y > viewport.height) {
    x = x / dpr;
    y = y / dpr;
  }
  return { x: clamp(x, viewport.width), y: clamp(y, viewport.height) };
}

export function interpolate(from: Point, to: Point, steps: number): Point[] {
  const points: Point[] = [];
  for (let i = 1; i <= steps; i++) {
    points.push({
      x: from.x + ((to.x - from.x) * i) / steps,
      y: from.y + ((to.y - from.y) * i) / steps,
    });
  }
  return points;
}

/** Clicks this close to the top-left corner only go to menu-like controls. */
export const CORNER_GUARD_PX = 80;

export function isInTopLeftCorner(point: Point, size = CORNER_GUARD_PX): boolean {
  return point.x <= size && point.y <= size;
}
