/**
 * Error Class Tests — context fields and messages.
 */
import { describe, it, expect } from "vitest";
import {
  JobStateError,
  NumberFormatError,
  DuplicateMapError,
  SampleParseError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolTimeoutError,
} from "../errors.js";

describe("ToolExecutionError", () => {
  it("carries the tool and exit status", () => {
    const err = new ToolExecutionError("r.mapcalc", 1);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ToolExecutionError");
    expect(err.tool).toBe("r.mapcalc");
    expect(err.exitCode).toBe(1);
    expect(err.message).toBe("r.mapcalc exited with status 1");
  });

  it("appends trimmed stderr", () => {
    const err = new ToolExecutionError("r.info", 1, "ERROR: Raster map <x> not found\n");
    expect(err.message).toBe("r.info exited with status 1: ERROR: Raster map <x> not found");
  });
});

describe("ToolNotFoundError", () => {
  it("names the missing tool", () => {
    expect(new ToolNotFoundError("r.what").message).toContain('"r.what"');
  });
});

describe("ToolTimeoutError", () => {
  it("tracks the timeout", () => {
    const err = new ToolTimeoutError("r.info", 5000);
    expect(err.timeoutMs).toBe(5000);
    expect(err.message).toBe("r.info timed out (5000ms)");
  });
});

describe("NumberFormatError", () => {
  it("distinguishes missing from malformed values", () => {
    expect(new NumberFormatError(undefined, "min").message).toBe('Missing numeric value for "min"');
    expect(new NumberFormatError("abc").message).toBe('Could not convert "abc" to a number');
  });
});

describe("SampleParseError", () => {
  it("reports both column counts", () => {
    const err = new SampleParseError("1|2|3", 6, 3);
    expect(err.expectedColumns).toBe(6);
    expect(err.actualColumns).toBe(3);
    expect(err.message).toBe('Unexpected r.what output: expected 6 columns, got 3 in "1|2|3"');
  });
});

describe("DuplicateMapError", () => {
  it("names the repeated map", () => {
    const err = new DuplicateMapError("elevation");
    expect(err.map).toBe("elevation");
    expect(err.message).toBe("Raster map <elevation> is listed more than once");
  });
});

describe("JobStateError", () => {
  it("describes the refused action", () => {
    expect(new JobStateError("terminated", "terminate").message).toBe(
      "Cannot terminate a job that is terminated",
    );
  });
});
