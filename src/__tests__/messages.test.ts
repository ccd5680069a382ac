import { describe, it, expect, vi, afterEach } from "vitest";
import { t } from "../i18n/messages.js";
import { collectMessages, consoleMessages } from "../ui/messages.js";
import { FatalError } from "../errors.js";

describe("t", () => {
  it("fills placeholders", () => {
    expect(t("History written for <{map}>", { map: "slope" }, "en")).toBe("History written for <slope>");
  });

  it("looks messages up in the locale catalog", () => {
    expect(t("No data", {}, "de")).toBe("Keine Daten");
    expect(t("History written for <{map}>", { map: "slope" }, "de")).toBe("Historie für <slope> geschrieben");
  });

  it("falls back to the source string", () => {
    expect(t("Not in any catalog", {}, "de")).toBe("Not in any catalog");
  });

  it("leaves unknown placeholders in place", () => {
    expect(t("{a} and {b}", { a: 1 }, "en")).toBe("1 and {b}");
  });
});

describe("consoleMessages", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints warnings to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    consoleMessages.warning("careful");
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain("careful");
  });

  it("prints and throws on fatal", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(() => consoleMessages.fatal("stop")).toThrow(FatalError);
  });
});

describe("collectMessages", () => {
  it("keeps warnings and fatals in order", () => {
    const messages = collectMessages();
    messages.warning("one");
    messages.warning("two");
    expect(() => messages.fatal("three")).toThrow("three");
    expect(messages.warnings).toEqual(["one", "two"]);
    expect(messages.fatals).toEqual(["three"]);
  });
});
