/**
 * raster.ts — Raster module high-level API
 *
 * Each function maps one call onto one GRASS module invocation:
 * builds the argument vector → runs the module → parses its stdout.
 *
 * Workspace state is never cached; pass `workspace` to skip the g.gisenv
 * lookup, and `runner` to replace the process layer.
 */

import { loadConfig, type BridgeConfig } from "../config.js";
import { DuplicateMapError, SampleParseError, ToolExecutionError } from "../errors.js";
import { t } from "../i18n/messages.js";
import type { Locale } from "../i18n/config.js";
import { consoleMessages, type MessageSink } from "../ui/messages.js";
import { parseKeyVal } from "../utils/keyval.js";
import { floatOrDms, parseFloatStrict } from "../utils/numbers.js";
import { resolveSeed } from "../utils/seed.js";
import { substitute, type TemplateBindings } from "../utils/template.js";
import { feedTool, readTool, runTool, writeTool, type InvokeOptions } from "./executor.js";
import { MapcalcJob } from "./job.js";
import { currentWorkspace, findFile, type WorkspaceContext } from "./workspace.js";
import { historyCommand, infoCommand, mapcalcCommand, whatCommand } from "./commands/raster.js";

export interface BridgeOptions extends InvokeOptions {
  messages?: MessageSink;
}

function resolveOptions<T extends BridgeOptions>(options: T): T & { config: BridgeConfig; messages: MessageSink } {
  return {
    ...options,
    config: options.config ?? loadConfig(),
    messages: options.messages ?? consoleMessages,
  };
}

// ─── History ─────────────────────────────────────────────

export interface HistoryOptions extends BridgeOptions {
  workspace?: WorkspaceContext;
  /** Recorded as the history line. Defaults to $CMDLINE, then this process's argv. */
  commandLine?: string;
}

/**
 * Record the command that produced a raster map in its history (r.support).
 * Only maps in the current mapset are writable.
 *
 * @returns true when the history was written; false (with a warning) when
 *   the map is not in the current mapset
 */
export async function rasterHistory(map: string, options: HistoryOptions = {}): Promise<boolean> {
  const opts = resolveOptions(options);
  const workspace = opts.workspace ?? (await currentWorkspace(opts));
  const found = await findFile(map, { runner: opts.runner, env: opts.env, config: opts.config });

  if (found.mapset !== "" && found.mapset === workspace.mapset) {
    const history =
      opts.commandLine ?? opts.config.commandLine ?? process.argv.slice(1).join(" ");
    const { tool, params } = historyCommand(map, history);
    await runTool(tool, params, opts);
    return true;
  }

  opts.messages.warning(
    t(
      "Unable to write history for <{map}>. Raster map <{map}> not found in current mapset.",
      { map },
      opts.config.locale,
    ),
  );
  return false;
}

// ─── Info ────────────────────────────────────────────────

/**
 * Parsed `r.info -gre` output. The listed fields are converted to numbers;
 * every other field is kept as printed (quotes included).
 */
export interface RasterInfo {
  north: number;
  south: number;
  east: number;
  west: number;
  nsres: number;
  ewres: number;
  /** null when the map has no data */
  min: number | null;
  max: number | null;
  [field: string]: string | number | null | undefined;
}

function floatOrNull(value: string | undefined, field: string): number | null {
  return value === "NULL" ? null : parseFloatStrict(value, field);
}

/** Convert r.info's key=value text into a RasterInfo. */
export function parseRasterInfo(text: string): RasterInfo {
  const kv = parseKeyVal(text);
  return {
    ...kv,
    min: floatOrNull(kv.min, "min"),
    max: floatOrNull(kv.max, "max"),
    north: parseFloatStrict(kv.north, "north"),
    south: parseFloatStrict(kv.south, "south"),
    east: parseFloatStrict(kv.east, "east"),
    west: parseFloatStrict(kv.west, "west"),
    // Lat/long locations report resolution as d:m:s
    nsres: floatOrDms(kv.nsres, "nsres"),
    ewres: floatOrDms(kv.ewres, "ewres"),
  };
}

/**
 * @throws NumberFormatError when a numeric field is missing or malformed
 */
export async function rasterInfo(map: string, options: BridgeOptions = {}): Promise<RasterInfo> {
  const { tool, params } = infoCommand(map);
  return parseRasterInfo(await readTool(tool, params, options));
}

// ─── Map Algebra ─────────────────────────────────────────

export interface MapcalcOptions extends BridgeOptions {
  /** Values for `$name` placeholders in the expression. */
  bindings?: TemplateBindings;
  quiet?: boolean;
  verbose?: boolean;
  overwrite?: boolean;
  /** Seed for rand(); "auto" derives one from the pid and the clock. */
  seed?: number | "auto";
}

function prepareMapcalc(expression: string, options: MapcalcOptions) {
  // Template errors surface here, before any process is started
  const text = substitute(expression, options.bindings);
  const seed = resolveSeed(options.seed);
  const command = mapcalcCommand({
    quiet: options.quiet,
    verbose: options.verbose,
    overwrite: options.overwrite,
    seed,
  });
  return { text, seed, command };
}

/**
 * Evaluate a map algebra expression with r.mapcalc and wait for it.
 * The expression goes through stdin, so it needs no shell quoting.
 *
 * @throws TemplateError for a placeholder without a binding
 * @throws FatalError when r.mapcalc fails
 */
export async function mapcalc(expression: string, options: MapcalcOptions = {}): Promise<void> {
  const opts = resolveOptions(options);
  const { text, command } = prepareMapcalc(expression, opts);
  try {
    await writeTool(command.tool, command.params, text, opts);
  } catch (err: unknown) {
    if (err instanceof ToolExecutionError) {
      opts.messages.fatal(t("An error occurred while running r.mapcalc", {}, opts.config.locale));
    }
    throw err;
  }
}

/**
 * Start r.mapcalc without waiting for it.
 *
 * @example
 *   const a = mapcalcStart('"$out" = "$in" * 10', { bindings: { out: "ele10", in: "elevation" } });
 *   const b = mapcalcStart('"slope2" = slope * 2');
 *   const [codeA, codeB] = await Promise.all([a.wait(), b.wait()]);
 */
export function mapcalcStart(expression: string, options: MapcalcOptions = {}): MapcalcJob {
  const { text, seed, command } = prepareMapcalc(expression, options);
  const child = feedTool(command.tool, command.params, options);
  return new MapcalcJob(child, text, seed);
}

export interface ScopedJobResult<T> {
  result: T;
  exitCode: number;
}

/**
 * Run `fn` alongside an r.mapcalc job and wait for the job before returning.
 * If `fn` throws, the job is terminated and awaited before the error is
 * rethrown.
 */
export async function withMapcalcJob<T>(
  expression: string,
  fn: (job: MapcalcJob) => Promise<T> | T,
  options: MapcalcOptions = {},
): Promise<ScopedJobResult<T>> {
  const job = mapcalcStart(expression, options);
  let result: T;
  try {
    result = await fn(job);
  } catch (err: unknown) {
    if (job.state === "running") job.terminate();
    await Promise.allSettled([job.wait()]);
    throw err;
  }
  return { result, exitCode: await job.wait() };
}

// ─── Point Sampling ──────────────────────────────────────

export type Coordinate = readonly [east: number, north: number];

export interface SampleFields {
  value: string;
  label: string;
  color: string;
}

/** One query point: map name → what that map holds at the point. */
export type SamplePoint = Record<string, SampleFields>;

export const SAMPLE_FIELDS = ["value", "label", "color"] as const;

/** east|north|site label, ahead of the per-map columns */
const PREFIX_COLUMNS = 3;
const SEPARATOR = "|";

function isCoordinate(value: Coordinate | readonly Coordinate[]): value is Coordinate {
  return typeof value[0] === "number";
}

function formatCoordinate([east, north]: Coordinate): string {
  return `${east.toFixed(6)},${north.toFixed(6)}`;
}

// Points are keyed by map name, so a repeated map would overwrite its own columns
function assertDistinctMaps(maps: readonly string[]): void {
  const seen = new Set<string>();
  for (const map of maps) {
    if (seen.has(map)) throw new DuplicateMapError(map);
    seen.add(map);
  }
}

/**
 * Split r.what output into one SamplePoint per line. Every line must have
 * exactly three prefix columns plus three columns per map.
 *
 * @throws SampleParseError on a line with any other column count
 * @throws DuplicateMapError when a map name repeats
 */
export function parseSampleOutput(output: string, maps: readonly string[]): SamplePoint[] {
  assertDistinctMaps(maps);
  const points: SamplePoint[] = [];
  const expected = PREFIX_COLUMNS + maps.length * SAMPLE_FIELDS.length;

  for (const line of output.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const columns = line.split(SEPARATOR);
    if (columns.length !== expected) {
      throw new SampleParseError(line, expected, columns.length);
    }
    const values = columns.slice(PREFIX_COLUMNS);
    const point: SamplePoint = {};
    maps.forEach((name, i) => {
      const [value, label, color] = values.slice(i * SAMPLE_FIELDS.length);
      point[name] = { value, label, color };
    });
    points.push(point);
  }
  return points;
}

/**
 * Query raster values, category labels and colours at one or more points
 * (r.what). All maps and points go into a single invocation.
 *
 * @returns one entry per point, in query order; empty when r.what prints nothing
 * @throws DuplicateMapError when a map is listed twice, before r.what runs
 */
export function rasterWhat(
  maps: string | readonly string[],
  coordinate: Coordinate,
  options?: BridgeOptions,
): Promise<SamplePoint[]>;
export function rasterWhat(
  maps: string | readonly string[],
  coordinates: readonly Coordinate[],
  options?: BridgeOptions,
): Promise<SamplePoint[]>;
export async function rasterWhat(
  maps: string | readonly string[],
  coordinates: Coordinate | readonly Coordinate[],
  options: BridgeOptions = {},
): Promise<SamplePoint[]> {
  const mapList = typeof maps === "string" ? [maps] : maps;
  const points = isCoordinate(coordinates) ? [coordinates] : coordinates;
  if (mapList.length === 0 || points.length === 0) return [];
  assertDistinctMaps(mapList);

  const config = options.config ?? loadConfig();
  const { tool, params } = whatCommand(
    mapList,
    points.map(formatCoordinate),
    t("No data", {}, config.locale),
  );
  const output = await readTool(tool, params, { ...options, config });
  return parseSampleOutput(output, mapList);
}

export type LocalizedSamplePoint = Record<string, Record<string, string>>;

/**
 * Rename the value/label/color keys to their translations for display.
 * The values are untouched.
 */
export function localizeSamplePoints(points: readonly SamplePoint[], locale?: Locale): LocalizedSamplePoint[] {
  return points.map((point) =>
    Object.fromEntries(
      Object.entries(point).map(([map, fields]) => [
        map,
        Object.fromEntries(SAMPLE_FIELDS.map((key) => [t(key, {}, locale), fields[key]])),
      ]),
    ),
  );
}
