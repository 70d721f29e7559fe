/**
 * Dial color configuration.
 *
 * Colors arrive from props or from Vite env variables and are resolved
 * once, when the controller is constructed. A color may be any CSS color
 * string or a 32-bit `0xAARRGGBB` integer. Missing colors fall back to
 * fully transparent.
 */

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

/** A CSS color string. */
export type Color = string;

export interface DialColors {
  low: Color;
  medium: Color;
  high: Color;
}

/** Unvalidated color input, e.g. straight from props or env. */
export type DialColorConfig = Partial<Record<keyof DialColors, unknown>>;

/* --------------------------------------------------------------------------
   Constants
   -------------------------------------------------------------------------- */

const MAX_ARGB = 0xffffffff;

/** Env variable read for each configurable color. */
export const COLOR_ENV_KEYS: Record<keyof DialColors, string> = {
  low: "VITE_FAN_COLOR_LOW",
  medium: "VITE_FAN_COLOR_MEDIUM",
  high: "VITE_FAN_COLOR_HIGH",
};

/* --------------------------------------------------------------------------
   Helpers
   -------------------------------------------------------------------------- */

/** Convert a packed `0xAARRGGBB` integer to an `rgba()` string. */
export function argbToCss(argb: number): Color {
  const a = (argb >>> 24) & 0xff;
  const r = (argb >>> 16) & 0xff;
  const g = (argb >>> 8) & 0xff;
  const b = argb & 0xff;
  const alpha = Number((a / 255).toFixed(3));
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}

export const TRANSPARENT: Color = argbToCss(0);

function resolveColor(key: keyof DialColors, value: unknown): Color {
  if (value === undefined || value === null || value === "") return TRANSPARENT;

  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? TRANSPARENT : trimmed;
  }

  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_ARGB) {
    return argbToCss(value);
  }

  console.warn(`[fan-dial] Ignoring invalid ${key} color: ${String(value)}`);
  return TRANSPARENT;
}

/* --------------------------------------------------------------------------
   Public API
   -------------------------------------------------------------------------- */

export function resolveDialColors(config: DialColorConfig = {}): DialColors {
  return {
    low: resolveColor("low", config.low),
    medium: resolveColor("medium", config.medium),
    high: resolveColor("high", config.high),
  };
}

/** Pick the dial colors out of an env record such as `import.meta.env`. */
export function dialColorsFromEnv(env: Readonly<Record<string, unknown>>): DialColorConfig {
  return {
    low: env[COLOR_ENV_KEYS.low],
    medium: env[COLOR_ENV_KEYS.medium],
    high: env[COLOR_ENV_KEYS.high],
  };
}
