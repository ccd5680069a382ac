/**
 * workspace.ts — g.gisenv / g.findfile invocations
 */

import type { ToolParams } from "../params.js";

export interface ToolCommand {
  tool: string;
  params: ToolParams;
}

export function gisenvCommand(): ToolCommand {
  return { tool: "g.gisenv", params: { flags: "n" } };
}

/** Element names accepted in place of the on-disk directory name. */
const ELEMENT_ALIASES: Record<string, string> = {
  raster: "cell",
  rast: "cell",
};

/**
 * Look up a file. Without `mapset`, every mapset on the search path is
 * searched.
 */
export function findFileCommand(name: string, element = "cell", mapset?: string): ToolCommand {
  return {
    tool: "g.findfile",
    params: {
      flags: "n",
      options: {
        element: ELEMENT_ALIASES[element] ?? element,
        file: name,
        mapset,
      },
    },
  };
}
