import { describe, it, expect } from "vitest";
import { parseKeyVal } from "../keyval.js";

describe("parseKeyVal", () => {
  it("splits lines at the first separator and trims both sides", () => {
    expect(parseKeyVal("north=228500\n  creator = \"helena\" \n")).toEqual({
      north: "228500",
      creator: '"helena"',
    });
  });

  it("keeps separators that appear inside the value", () => {
    expect(parseKeyVal("comments=\"a = b * 2\"")).toEqual({ comments: '"a = b * 2"' });
  });

  it("skips blank lines and handles CRLF", () => {
    expect(parseKeyVal("a=1\r\n\r\nb=2\r\n")).toEqual({ a: "1", b: "2" });
  });

  it("maps records without a separator to the default value", () => {
    expect(parseKeyVal("flag\na=1")).toEqual({ flag: undefined, a: "1" });
    expect(parseKeyVal("flag", { defaultValue: "yes" })).toEqual({ flag: "yes" });
  });

  it("supports custom key and record separators", () => {
    expect(parseKeyVal("a: 1;b: 2", { sep: ":", vsep: ";" })).toEqual({ a: "1", b: "2" });
  });

  it("returns an empty record for empty input", () => {
    expect(parseKeyVal("")).toEqual({});
  });
});
