import { describe, it, expect } from "vitest";
import { loadConfig, resolveLocale } from "../config.js";

describe("loadConfig", () => {
  it("reads every setting from the environment", () => {
    expect(
      loadConfig({
        GIS_TOOL_TIMEOUT: "5000",
        GIS_TOOL_DIR: " /opt/grass/bin ",
        GIS_BRIDGE_LOCALE: "de",
        GIS_BRIDGE_DEBUG: "1",
        CMDLINE: "r.slope.aspect elevation=elevation",
      }),
    ).toEqual({
      toolTimeoutMs: 5000,
      toolDir: "/opt/grass/bin",
      locale: "de",
      debug: true,
      commandLine: "r.slope.aspect elevation=elevation",
    });
  });

  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      toolTimeoutMs: 0,
      toolDir: "",
      locale: "en",
      debug: false,
      commandLine: undefined,
    });
  });

  it("ignores invalid timeouts", () => {
    expect(loadConfig({ GIS_TOOL_TIMEOUT: "soon" }).toolTimeoutMs).toBe(0);
    expect(loadConfig({ GIS_TOOL_TIMEOUT: "-5" }).toolTimeoutMs).toBe(0);
  });
});

describe("resolveLocale", () => {
  it("takes the language part of LANG", () => {
    expect(resolveLocale({ LANG: "de_DE.UTF-8" })).toBe("de");
  });

  it("prefers the explicit setting, then LC_ALL", () => {
    expect(resolveLocale({ GIS_BRIDGE_LOCALE: "en", LANG: "de_DE.UTF-8" })).toBe("en");
    expect(resolveLocale({ LC_ALL: "de_AT.UTF-8", LANG: "en_US.UTF-8" })).toBe("de");
  });

  it("falls back to English for unsupported languages", () => {
    expect(resolveLocale({ LANG: "fr_FR.UTF-8" })).toBe("en");
    expect(resolveLocale({ LANG: "C" })).toBe("en");
  });
});
