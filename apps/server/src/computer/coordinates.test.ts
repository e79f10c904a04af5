import { describe, expect, it } from "vitest";
import { interpolate, isInTopLeftCorner, normalizePoint } from "./coordinates.js";

const phone = { width: 440, height: 956, devicePixelRatio: 2 };

describe("normalizePoint", () => {
  it("passes points inside the viewport through", () => {
    expect(normalizePoint({ x: 100, y: 200 }, phone)).toEqual({ x: 100, y: 200 });
  });

  it("treats out-of-viewport points as device pixels", () => {
    expect(normalizePoint({ x: 600, y: 1200 }, phone)).toEqual({ x: 300, y: 600 });
  });

  it("clamps to the last pixel on each axis", () => {
    const flat = { width: 440, height: 956, devicePixelRatio: 1 };
    expect(normalizePoint({ x: 500, y: -5 }, flat)).toEqual({ x: 439, y: 0 });
    expect(normalizePoint({ x: 2000, y: 3000 }, phone)).toEqual({ x: 439, y: 955 });
  });

  it("ignores a non-positive pixel ratio", () => {
    expect(normalizePoint({ x: 500, y: 10 }, { width: 440, height: 956, devicePixelRatio: 0 })).toEqual({
      x: 439,
      y: 10,
    });
  });
});

describe("interpolate", () => {
  it("steps evenly and ends on the target", () => {
    expect(interpolate({ x: 0, y: 0 }, { x: 10, y: 20 }, 5)).toEqual([
      { x: 2, y: 4 },
      { x: 4, y: 8 },
      { x: 6, y: 12 },
      { x: 8, y: 16 },
      { x: 10, y: 20 },
    ]);
  });
});

describe("isInTopLeftCorner", () => {
  it("covers the 80px square", () => {
    expect(isInTopLeftCorner({ x: 80, y: 80 })).toBe(true);
    expect(isInTopLeftCorner({ x: 81, y: 10 })).toBe(false);
  });
});
