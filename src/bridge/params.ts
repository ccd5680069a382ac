/**
 * params.ts — Argument vectors for GRASS modules
 *
 * A module call is `<tool> [--o] [--q] [--v] [--qq] [-flags] key=value ...`.
 */

import { InvalidFlagError } from "../errors.js";

export type OptionValue = string | number | ReadonlyArray<string | number>;

export interface ToolParams {
  /** Single-letter flags, concatenated: "gre" → "-gre". */
  flags?: string;
  overwrite?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  superquiet?: boolean;
  /** Module options in the order they should appear. */
  options?: Record<string, OptionValue | null | undefined>;
}

function formatValue(value: OptionValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return value.map(String).join(",");
}

/**
 * Option names that clash with JS keywords or reserved words can be written
 * with a leading or trailing underscore (`_from`, `type_`).
 */
function optionName(key: string): string {
  if (key.startsWith("_")) return key.slice(1);
  if (key.endsWith("_")) return key.slice(0, -1);
  return key;
}

export function buildToolArgs(params: ToolParams = {}): string[] {
  const args: string[] = [];
  if (params.overwrite) args.push("--o");
  if (params.quiet) args.push("--q");
  if (params.verbose) args.push("--v");
  if (params.superquiet) args.push("--qq");

  if (params.flags) {
    if (params.flags.includes("-")) throw new InvalidFlagError(params.flags);
    args.push(`-${params.flags}`);
  }

  for (const [key, value] of Object.entries(params.options ?? {})) {
    if (value === undefined || value === null) continue;
    args.push(`${optionName(key)}=${formatValue(value)}`);
  }
  return args;
}
