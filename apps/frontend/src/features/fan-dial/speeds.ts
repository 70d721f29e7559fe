/**
 * Fan speed cycle.
 *
 * The dial steps through a closed set of four speeds. Each speed owns an
 * ordinal (its angular slot on the dial), a successor and a label id that
 * the string table resolves to display text.
 */

import type { StringId } from "./strings";

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

export type FanSpeed = "OFF" | "LOW" | "MEDIUM" | "HIGH";

/** Angular slot of a speed. Only four of the eight 45° slots are used. */
export type SpeedOrdinal = 0 | 1 | 2 | 3;

/* --------------------------------------------------------------------------
   Constants
   -------------------------------------------------------------------------- */

/** All speeds in ordinal order. */
export const FAN_SPEEDS: readonly FanSpeed[] = ["OFF", "LOW", "MEDIUM", "HIGH"];

/** The speed at the end of the cycle; the next activation resets to OFF. */
export const MAX_SPEED: FanSpeed = "HIGH";

const ORDINALS: Record<FanSpeed, SpeedOrdinal> = {
  OFF: 0,
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
};

const NEXT: Record<FanSpeed, FanSpeed> = {
  OFF: "LOW",
  LOW: "MEDIUM",
  MEDIUM: "HIGH",
  HIGH: "OFF",
};

const LABELS: Record<FanSpeed, StringId> = {
  OFF: "fan_off",
  LOW: "fan_low",
  MEDIUM: "fan_medium",
  HIGH: "fan_high",
};

/* --------------------------------------------------------------------------
   Transitions
   -------------------------------------------------------------------------- */

export function nextSpeed(speed: FanSpeed): FanSpeed {
  return NEXT[speed];
}

export function speedOrdinal(speed: FanSpeed): SpeedOrdinal {
  return ORDINALS[speed];
}

export function speedLabel(speed: FanSpeed): StringId {
  return LABELS[speed];
}
