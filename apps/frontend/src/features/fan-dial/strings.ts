/**
 * Display strings for the fan dial.
 *
 * Hosts can override any entry (e.g. for localisation); unknown ids never
 * reach the lookup because `StringId` is closed.
 */

export type StringId = "fan_off" | "fan_low" | "fan_medium" | "fan_high" | "change" | "reset";

export type StringTable = Record<StringId, string>;

export type StringLookup = (id: StringId) => string;

export const DEFAULT_STRINGS: Readonly<StringTable> = {
  fan_off: "off",
  fan_low: "1",
  fan_medium: "2",
  fan_high: "3",
  change: "change",
  reset: "reset",
};

/** Build a lookup over the default table with optional overrides applied. */
export function createStringLookup(overrides: Partial<StringTable> = {}): StringLookup {
  const table: StringTable = { ...DEFAULT_STRINGS, ...overrides };
  return (id) => table[id];
}
