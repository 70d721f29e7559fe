/**
 * Fan dial controller.
 *
 * Owns the dial's state and is its only writer. Hosts drive it with
 * `resize` and `activate`, listen for repaint requests via `subscribe`,
 * and paint through `render`.
 */

import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";

import { resolveDialColors } from "./config";
import type { Color, DialColorConfig, DialColors } from "./config";
import {
  computeRadius,
  dialCenter,
  indicatorDotRadius,
  indicatorRingRadius,
  labelRingRadius,
  positionForIndex,
} from "./geometry";
import { FAN_SPEEDS, MAX_SPEED, nextSpeed, speedLabel, speedOrdinal } from "./speeds";
import type { FanSpeed } from "./speeds";
import { createStringLookup } from "./strings";
import type { StringLookup } from "./strings";
import type { DialSurface } from "./surface";

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

export interface DialState {
  speed: FanSpeed;
  radius: number;
  colors: Readonly<DialColors>;
  description: string;
  actionLabel: string;
}

/** What assistive technology is told about the dial. */
export interface AccessibilityDescriptor {
  description: string;
  /** Label of the single custom action: "change", or "reset" at the top speed. */
  actionLabel: string;
}

export interface DialControllerOptions {
  colors?: DialColorConfig;
  lookup?: StringLookup;
}

/* --------------------------------------------------------------------------
   Constants
   -------------------------------------------------------------------------- */

export const OFF_COLOR: Color = "#888888";
export const INDICATOR_COLOR: Color = "#000000";
export const LABEL_COLOR: Color = "#000000";
export const LABEL_FONT_SIZE = 55;

/* --------------------------------------------------------------------------
   Controller
   -------------------------------------------------------------------------- */

export class DialController {
  /** The dial always accepts activation. */
  readonly clickable = true;

  private readonly store: StoreApi<DialState>;
  private readonly lookup: StringLookup;

  constructor(options: DialControllerOptions = {}) {
    this.lookup = options.lookup ?? createStringLookup();

    const speed: FanSpeed = "OFF";
    this.store = createStore<DialState>()(() => ({
      speed,
      radius: 0,
      colors: resolveDialColors(options.colors),
      ...this.describe(speed),
    }));
  }

  /* -- Mutations ---------------------------------------------------------- */

  /** Recompute the radius from the host's new bounds. */
  resize(width: number, height: number): void {
    const radius = computeRadius(width, height);
    if (radius === this.store.getState().radius) return;
    this.store.setState({ radius });
  }

  /**
   * Advance to the next speed. When the host reports the activation as
   * already handled upstream, nothing changes. Always returns `true`.
   */
  activate(handledUpstream = false): boolean {
    if (handledUpstream) return true;

    const speed = nextSpeed(this.store.getState().speed);
    this.store.setState({ speed, ...this.describe(speed) });
    return true;
  }

  /* -- Reads -------------------------------------------------------------- */

  currentSpeed(): FanSpeed {
    return this.store.getState().speed;
  }

  currentRadius(): number {
    return this.store.getState().radius;
  }

  currentDescription(): string {
    return this.store.getState().description;
  }

  accessibility(): AccessibilityDescriptor {
    const { description, actionLabel } = this.store.getState();
    return { description, actionLabel };
  }

  /** Current state; the reference only changes when the state does. */
  getSnapshot = (): Readonly<DialState> => this.store.getState();

  /** Register a repaint listener. Returns the unsubscribe function. */
  subscribe = (listener: () => void): (() => void) => this.store.subscribe(listener);

  /* -- Rendering ---------------------------------------------------------- */

  render(surface: DialSurface): void {
    const { speed, radius, colors } = this.store.getState();
    const center = dialCenter(surface.width, surface.height);

    surface.drawFilledCircle(center.x, center.y, radius, fillColor(speed, colors));

    const indicator = positionForIndex(speedOrdinal(speed), indicatorRingRadius(radius), center);
    surface.drawFilledCircle(indicator.x, indicator.y, indicatorDotRadius(radius), INDICATOR_COLOR);

    const ring = labelRingRadius(radius);
    for (const labelSpeed of FAN_SPEEDS) {
      const position = positionForIndex(speedOrdinal(labelSpeed), ring, center);
      surface.drawCenteredText(
        this.lookup(speedLabel(labelSpeed)),
        position.x,
        position.y,
        LABEL_COLOR,
        LABEL_FONT_SIZE,
        "bold",
      );
    }
  }

  private describe(speed: FanSpeed): Pick<DialState, "description" | "actionLabel"> {
    return {
      description: this.lookup(speedLabel(speed)),
      actionLabel: this.lookup(speed === MAX_SPEED ? "reset" : "change"),
    };
  }
}

function fillColor(speed: FanSpeed, colors: Readonly<DialColors>): Color {
  switch (speed) {
    case "OFF":
      return OFF_COLOR;
    case "LOW":
      return colors.low;
    case "MEDIUM":
      return colors.medium;
    case "HIGH":
      return colors.high;
  }
}
