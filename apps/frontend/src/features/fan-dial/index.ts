/**
 * Fan dial feature barrel export.
 */

// Core
export { DialController } from "./DialController";
export { computeRadius, dialCenter, positionForIndex } from "./geometry";
export { FAN_SPEEDS, nextSpeed, speedLabel, speedOrdinal } from "./speeds";

// Configuration and strings
export { resolveDialColors, dialColorsFromEnv, argbToCss, TRANSPARENT } from "./config";
export { DEFAULT_STRINGS, createStringLookup } from "./strings";

// Rendering
export { createCanvasSurface } from "./canvasSurface";

// Components
export { FanDial } from "./FanDial";

// Types
export type { AccessibilityDescriptor, DialControllerOptions, DialState } from "./DialController";
export type { Color, DialColorConfig, DialColors } from "./config";
export type { FanSpeed, SpeedOrdinal } from "./speeds";
export type { StringId, StringLookup, StringTable } from "./strings";
export type { DialSurface, FontWeight } from "./surface";
export type { Point } from "./geometry";
