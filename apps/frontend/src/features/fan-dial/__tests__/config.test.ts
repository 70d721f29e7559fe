import { describe, expect, it, vi } from "vitest";

import { TRANSPARENT, argbToCss, dialColorsFromEnv, resolveDialColors } from "../config";
import { DEFAULT_STRINGS, createStringLookup } from "../strings";

describe("argbToCss", () => {
  it("unpacks opaque colors", () => {
    expect(argbToCss(0xffff0000)).toBe("rgba(255, 0, 0, 1)");
    expect(argbToCss(0xff009688)).toBe("rgba(0, 150, 136, 1)");
  });

  it("rounds partial alpha to three places", () => {
    expect(argbToCss(0x80ff0000)).toBe("rgba(255, 0, 0, 0.502)");
  });

  it("treats zero as transparent", () => {
    expect(argbToCss(0)).toBe("rgba(0, 0, 0, 0)");
    expect(TRANSPARENT).toBe("rgba(0, 0, 0, 0)");
  });
});

describe("resolveDialColors", () => {
  it("keeps CSS color strings, trimmed", () => {
    expect(resolveDialColors({ low: "red", medium: " #ffeb3b ", high: "rgb(0, 128, 0)" })).toEqual({
      low: "red",
      medium: "#ffeb3b",
      high: "rgb(0, 128, 0)",
    });
  });

  it("converts ARGB integers", () => {
    expect(resolveDialColors({ low: 0xff00ff00 }).low).toBe("rgba(0, 255, 0, 1)");
  });

  it("defaults missing colors to transparent without warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(resolveDialColors()).toEqual({
      low: TRANSPARENT,
      medium: TRANSPARENT,
      high: TRANSPARENT,
    });
    expect(resolveDialColors({ low: null, medium: "", high: "   " })).toEqual({
      low: TRANSPARENT,
      medium: TRANSPARENT,
      high: TRANSPARENT,
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it("warns and falls back for values that are not colors", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const colors = resolveDialColors({ low: true, medium: -1, high: 1.5 });

    expect(colors).toEqual({ low: TRANSPARENT, medium: TRANSPARENT, high: TRANSPARENT });
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenNthCalledWith(1, "[fan-dial] Ignoring invalid low color: true");
    expect(warn).toHaveBeenNthCalledWith(2, "[fan-dial] Ignoring invalid medium color: -1");
    expect(warn).toHaveBeenNthCalledWith(3, "[fan-dial] Ignoring invalid high color: 1.5");
  });
});

describe("dialColorsFromEnv", () => {
  it("reads the VITE_FAN_COLOR_* variables", () => {
    const env = {
      MODE: "test",
      VITE_FAN_COLOR_LOW: "#ffeb3b",
      VITE_FAN_COLOR_HIGH: "#009688",
    };

    expect(dialColorsFromEnv(env)).toEqual({
      low: "#ffeb3b",
      medium: undefined,
      high: "#009688",
    });
  });
});

describe("createStringLookup", () => {
  it("resolves the default table", () => {
    const lookup = createStringLookup();
    expect(lookup("fan_off")).toBe("off");
    expect(lookup("fan_high")).toBe("3");
    expect(lookup("reset")).toBe(DEFAULT_STRINGS.reset);
  });

  it("applies overrides on top of the defaults", () => {
    const lookup = createStringLookup({ fan_low: "Low" });
    expect(lookup("fan_low")).toBe("Low");
    expect(lookup("fan_medium")).toBe("2");
  });
});
