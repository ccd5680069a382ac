/**
 * errors.ts — Error classes raised by the bridge
 *
 * Each class carries the context a caller needs to tell failures apart
 * without parsing the message.
 */

// ─── Process Invocation ─────────────────────────────────

/**
 * A tool ran but exited with a nonzero status.
 */
export class ToolExecutionError extends Error {
  public readonly tool: string;
  public readonly exitCode: number;
  public readonly stderr?: string;

  constructor(tool: string, exitCode: number, stderr?: string) {
    const detail = stderr?.trim();
    super(`${tool} exited with status ${exitCode}${detail ? `: ${detail}` : ""}`);
    this.name = "ToolExecutionError";
    this.tool = tool;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** The executable could not be found on PATH (or under GIS_TOOL_DIR). */
export class ToolNotFoundError extends Error {
  public readonly tool: string;

  constructor(tool: string) {
    super(`Tool "${tool}" not found. Is the GIS environment active?`);
    this.name = "ToolNotFoundError";
    this.tool = tool;
  }
}

export class ToolTimeoutError extends Error {
  public readonly tool: string;
  public readonly timeoutMs: number;

  constructor(tool: string, timeoutMs: number) {
    super(`${tool} timed out (${timeoutMs}ms)`);
    this.name = "ToolTimeoutError";
    this.tool = tool;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised by the fatal message channel. Terminates the operation; callers
 * are not expected to recover from it.
 */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalError";
  }
}

// ─── Parsing ────────────────────────────────────────────

/** Unresolved or malformed placeholder in an expression template. */
export class TemplateError extends Error {
  public readonly placeholder?: string;

  constructor(message: string, placeholder?: string) {
    super(message);
    this.name = "TemplateError";
    this.placeholder = placeholder;
  }
}

export class NumberFormatError extends Error {
  public readonly value: string | undefined;
  public readonly field?: string;

  constructor(value: string | undefined, field?: string) {
    const where = field ? ` for "${field}"` : "";
    super(
      value === undefined
        ? `Missing numeric value${where}`
        : `Could not convert "${value}" to a number${where}`,
    );
    this.name = "NumberFormatError";
    this.value = value;
    this.field = field;
  }
}

/**
 * A sampler output row did not have the number of columns implied by the
 * requested maps. Raised instead of silently misaligning fields.
 */
export class SampleParseError extends Error {
  public readonly line: string;
  public readonly expectedColumns: number;
  public readonly actualColumns: number;

  constructor(line: string, expectedColumns: number, actualColumns: number) {
    super(
      `Unexpected r.what output: expected ${expectedColumns} columns, got ${actualColumns} in "${line}"`,
    );
    this.name = "SampleParseError";
    this.line = line;
    this.expectedColumns = expectedColumns;
    this.actualColumns = actualColumns;
  }
}

/** The same raster map was requested more than once in one sample. */
export class DuplicateMapError extends Error {
  public readonly map: string;

  constructor(map: string) {
    super(`Raster map <${map}> is listed more than once`);
    this.name = "DuplicateMapError";
    this.map = map;
  }
}

// ─── Arguments & State ──────────────────────────────────

export class InvalidFlagError extends Error {
  public readonly flags: string;

  constructor(flags: string) {
    super(`'-' is not a valid flag (got "${flags}")`);
    this.name = "InvalidFlagError";
    this.flags = flags;
  }
}

export class WorkspaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorkspaceError";
  }
}

/** An operation was attempted on a job in a state that does not allow it. */
export class JobStateError extends Error {
  public readonly state: string;
  public readonly action: string;

  constructor(state: string, action: string) {
    super(`Cannot ${action} a job that is ${state}`);
    this.name = "JobStateError";
    this.state = state;
    this.action = action;
  }
}
