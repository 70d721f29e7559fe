/**
 * Dial geometry.
 *
 * Pure polar-to-screen math shared by the indicator and the labels.
 * Screen coordinates grow downwards, so increasing angles run clockwise.
 */

import type { SpeedOrdinal } from "./speeds";

export interface Point {
  x: number;
  y: number;
}

/** Fraction of the short side the dial's diameter occupies. */
const RADIUS_SCALE = 0.8;

/** Angle of slot 0, in radians (202.5°). */
const START_ANGLE = Math.PI * (9 / 8);

/** Distance between neighbouring slots (45°). */
const ANGLE_STEP = Math.PI / 4;

/** Labels sit just outside the dial's edge. */
export const LABEL_RADIUS_OFFSET = 30;

/** The indicator dot sits inside the dial. */
export const INDICATOR_RADIUS_OFFSET = -35;

/** Indicator dot radius as a fraction of the dial radius. */
const INDICATOR_DOT_DIVISOR = 12;

export function computeRadius(width: number, height: number): number {
  return (RADIUS_SCALE * Math.min(width, height)) / 2.0;
}

export function dialCenter(width: number, height: number): Point {
  return { x: width / 2, y: height / 2 };
}

/** Screen position of a slot on a ring of the given radius around `center`. */
export function positionForIndex(ordinal: SpeedOrdinal, ringRadius: number, center: Point): Point {
  const angle = START_ANGLE + ordinal * ANGLE_STEP;
  return {
    x: center.x + ringRadius * Math.cos(angle),
    y: center.y + ringRadius * Math.sin(angle),
  };
}

export function labelRingRadius(radius: number): number {
  return radius + LABEL_RADIUS_OFFSET;
}

export function indicatorRingRadius(radius: number): number {
  return radius + INDICATOR_RADIUS_OFFSET;
}

export function indicatorDotRadius(radius: number): number {
  return radius / INDICATOR_DOT_DIVISOR;
}
