/**
 * raster.ts — r.support / r.info / r.mapcalc / r.what invocations
 */

import type { ToolCommand } from "./workspace.js";

export function historyCommand(map: string, history: string): ToolCommand {
  return { tool: "r.support", params: { options: { map, history } } };
}

/** Region extent (-g), resolution and range (-r), and general info (-e). */
export function infoCommand(map: string): ToolCommand {
  return { tool: "r.info", params: { flags: "gre", options: { map } } };
}

export interface MapcalcFlags {
  quiet?: boolean;
  verbose?: boolean;
  overwrite?: boolean;
  seed?: number;
}

/** The expression itself is sent on stdin (`file=-`), never as an argument. */
export function mapcalcCommand(flags: MapcalcFlags = {}): ToolCommand {
  return {
    tool: "r.mapcalc",
    params: {
      quiet: flags.quiet,
      verbose: flags.verbose,
      overwrite: flags.overwrite,
      options: { file: "-", seed: flags.seed },
    },
  };
}

/**
 * Query cell values, labels (-f) and colours (-r) of several maps at several
 * points in one call. `null` replaces missing values in the output.
 */
export function whatCommand(maps: readonly string[], coordinates: readonly string[], nullValue: string): ToolCommand {
  return {
    tool: "r.what",
    params: {
      flags: "rf",
      quiet: true,
      options: {
        map: maps,
        coordinates,
        null: nullValue,
        separator: "pipe",
      },
    },
  };
}
