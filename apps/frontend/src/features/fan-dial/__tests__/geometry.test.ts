import { describe, expect, it } from "vitest";

import {
  computeRadius,
  dialCenter,
  indicatorDotRadius,
  indicatorRingRadius,
  labelRingRadius,
  positionForIndex,
} from "../geometry";

describe("computeRadius", () => {
  it("uses 80% of half the short side", () => {
    expect(computeRadius(200, 100)).toBeCloseTo(40, 10);
    expect(computeRadius(100, 200)).toBeCloseTo(40, 10);
    expect(computeRadius(300, 300)).toBeCloseTo(120, 10);
  });

  it("collapses to zero for an empty box", () => {
    expect(computeRadius(0, 250)).toBe(0);
    expect(computeRadius(0, 0)).toBe(0);
  });
});

describe("dialCenter", () => {
  it("returns the midpoint of the box", () => {
    expect(dialCenter(300, 200)).toEqual({ x: 150, y: 100 });
    expect(dialCenter(301, 99)).toEqual({ x: 150.5, y: 49.5 });
  });
});

describe("positionForIndex", () => {
  it("places slot 0 at 9π/8 around the origin", () => {
    const p = positionForIndex(0, 100, { x: 0, y: 0 });
    expect(p.x).toBeCloseTo(100 * Math.cos((9 * Math.PI) / 8), 10);
    expect(p.y).toBeCloseTo(100 * Math.sin((9 * Math.PI) / 8), 10);
    expect(p.x).toBeCloseTo(-92.388, 3);
    expect(p.y).toBeCloseTo(-38.268, 3);
  });

  it("steps 45° per slot", () => {
    const center = { x: 150, y: 150 };
    for (const ordinal of [0, 1, 2, 3] as const) {
      const angle = (9 * Math.PI) / 8 + (ordinal * Math.PI) / 4;
      const p = positionForIndex(ordinal, 50, center);
      expect(p.x).toBeCloseTo(150 + 50 * Math.cos(angle), 10);
      expect(p.y).toBeCloseTo(150 + 50 * Math.sin(angle), 10);
    }
  });

  it("keeps every slot on the ring", () => {
    const center = { x: 40, y: -10 };
    for (const ordinal of [0, 1, 2, 3] as const) {
      const p = positionForIndex(ordinal, 75, center);
      expect(Math.hypot(p.x - center.x, p.y - center.y)).toBeCloseTo(75, 10);
    }
  });

  it("returns the center for a zero ring", () => {
    expect(positionForIndex(3, 0, { x: 12, y: 34 })).toEqual({ x: 12, y: 34 });
  });
});

describe("ring offsets", () => {
  it("pushes labels 30px outside the dial", () => {
    expect(labelRingRadius(120)).toBe(150);
  });

  it("pulls the indicator 35px inside the dial", () => {
    expect(indicatorRingRadius(120)).toBe(85);
  });

  it("sizes the indicator dot at a twelfth of the radius", () => {
    expect(indicatorDotRadius(120)).toBe(10);
    expect(indicatorDotRadius(0)).toBe(0);
  });
});
