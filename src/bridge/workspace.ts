/**
 * workspace.ts — Workspace (mapset) introspection
 *
 * Nothing here is cached: the current mapset can change between calls.
 */

import { ToolExecutionError, WorkspaceError } from "../errors.js";
import { parseKeyVal, type KeyValRecord } from "../utils/keyval.js";
import { captureTool, readTool, type InvokeOptions } from "./executor.js";
import { findFileCommand, gisenvCommand } from "./commands/workspace.js";

export interface WorkspaceContext {
  /** Name of the current, writable mapset. */
  mapset: string;
  location?: string;
  gisdbase?: string;
}

export interface FoundFile {
  name: string;
  /** Mapset holding the file; empty when it was not found. */
  mapset: string;
  fullname: string;
  file: string;
}

export async function gisenv(options: InvokeOptions = {}): Promise<KeyValRecord> {
  const { tool, params } = gisenvCommand();
  return parseKeyVal(await readTool(tool, params, options));
}

export async function currentWorkspace(options: InvokeOptions = {}): Promise<WorkspaceContext> {
  const env = await gisenv(options);
  if (!env.MAPSET) {
    throw new WorkspaceError("g.gisenv reported no MAPSET. Is a GRASS session running?");
  }
  return {
    mapset: env.MAPSET,
    location: env.LOCATION_NAME,
    gisdbase: env.GISDBASE,
  };
}

/**
 * Resolve which mapset a named file lives in. g.findfile exits with status 1
 * when nothing matches; that is reported as empty fields, not as an error.
 */
export async function findFile(
  name: string,
  options: InvokeOptions & { element?: string; mapset?: string } = {},
): Promise<FoundFile> {
  const { tool, params } = findFileCommand(name, options.element, options.mapset);
  const output = await captureTool(tool, params, options);
  if (output.exitCode !== 0 && output.exitCode !== 1) {
    throw new ToolExecutionError(tool, output.exitCode, output.stderr);
  }
  const kv = parseKeyVal(output.stdout);
  return {
    name: kv.name ?? "",
    mapset: kv.mapset ?? "",
    fullname: kv.fullname ?? "",
    file: kv.file ?? "",
  };
}

