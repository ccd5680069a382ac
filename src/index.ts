#!/usr/bin/env node
/**
 * index.ts — CLI entry point
 *
 *   grass-raster info <map>
 *   grass-raster what <map[,map...]> <east,north> [<east,north> ...]
 *   grass-raster mapcalc "<expression>" [name=value ...]
 *   grass-raster history <map>
 *
 * Must run inside a GRASS session (g.gisenv has to find a mapset).
 */

import { config as dotenvConfig } from "dotenv";
import { fileURLToPath } from "node:url";

// Load .env from the package directory, not cwd, so the global command works from any directory
dotenvConfig({ path: fileURLToPath(new URL("../.env", import.meta.url)) });
import chalk from "chalk";

import { log, startSpinner, stopSpinner } from "./ui/terminal.js";
import { formatRasterInfo, formatSamplePoints } from "./ui/formatter.js";
import {
  type Coordinate,
  localizeSamplePoints,
  mapcalc,
  mapcalcStart,
  rasterHistory,
  rasterInfo,
  rasterWhat,
} from "./bridge/raster.js";
import { loadConfig } from "./config.js";
import { FatalError } from "./errors.js";
import { t } from "./i18n/messages.js";
import { getCurrentVersion } from "./version.js";

// ─── Argument Parsing ────────────────────────────────────

interface ParsedArgs {
  positional: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

/** Options that take a value: `--seed 42` or `--seed=42`. */
const VALUE_OPTIONS = new Set(["seed"]);

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], flags: new Set(), values: new Map() };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      parsed.positional.push(arg);
      continue;
    }
    const [name, inline] = arg.slice(2).split("=", 2);
    if (VALUE_OPTIONS.has(name)) {
      const value = inline ?? argv[++i];
      if (value === undefined) throw new Error(`Option --${name} needs a value`);
      parsed.values.set(name, value);
    } else {
      parsed.flags.add(name);
    }
  }
  return parsed;
}

function parseCoordinate(text: string): Coordinate {
  const parts = text.split(",").map((p) => Number(p.trim()));
  if (parts.length !== 2 || parts.some((n) => !Number.isFinite(n))) {
    throw new Error(`Invalid coordinate "${text}". Expected east,north`);
  }
  return [parts[0], parts[1]];
}

function parseBindings(args: string[]): Record<string, string> {
  const bindings: Record<string, string> = {};
  for (const arg of args) {
    const idx = arg.indexOf("=");
    if (idx <= 0) throw new Error(`Invalid binding "${arg}". Expected name=value`);
    bindings[arg.slice(0, idx)] = arg.slice(idx + 1);
  }
  return bindings;
}

function parseSeed(value: string | undefined): number | "auto" | undefined {
  if (value === undefined || value === "auto") return value;
  const seed = Number(value);
  if (!Number.isInteger(seed) || seed < 0) {
    throw new Error(`Invalid seed "${value}". Expected a non-negative integer or "auto"`);
  }
  return seed;
}

function requireArg(value: string | undefined, usage: string): string {
  if (!value) throw new Error(`Usage: grass-raster ${usage}`);
  return value;
}

// ─── Commands ────────────────────────────────────────────

async function infoCommand(args: ParsedArgs): Promise<void> {
  const map = requireArg(args.positional[0], "info <map>");
  startSpinner(`r.info ${map}`);
  const info = await rasterInfo(map).finally(stopSpinner);
  console.log(chalk.bold(`\n${t("Raster map")} <${map}>`));
  console.log(formatRasterInfo(info));
}

async function whatCommand(args: ParsedArgs): Promise<void> {
  const usage = "what <map[,map...]> <east,north> [<east,north> ...]";
  const maps = requireArg(args.positional[0], usage).split(",");
  const coordinates = args.positional.slice(1).map(parseCoordinate);
  if (coordinates.length === 0) throw new Error(`Usage: grass-raster ${usage}`);

  startSpinner("r.what");
  const points = await rasterWhat(maps, coordinates).finally(stopSpinner);
  if (points.length === 0) {
    log.warn(t("No values returned"));
    return;
  }
  const display = args.flags.has("localized")
    ? localizeSamplePoints(points)
    : points.map((point) =>
        Object.fromEntries(Object.entries(point).map(([map, fields]) => [map, { ...fields }])),
      );
  console.log(formatSamplePoints(display, coordinates));
}

async function mapcalcCommand(args: ParsedArgs): Promise<void> {
  const expression = requireArg(args.positional[0], 'mapcalc "<expression>" [name=value ...]');
  const options = {
    bindings: parseBindings(args.positional.slice(1)),
    seed: parseSeed(args.values.get("seed")),
    quiet: args.flags.has("quiet"),
    verbose: args.flags.has("verbose"),
    overwrite: args.flags.has("overwrite"),
  };

  if (!args.flags.has("async")) {
    await mapcalc(expression, options);
    log.success(t("r.mapcalc finished"));
    return;
  }

  const job = mapcalcStart(expression, options);
  log.info(t("Started r.mapcalc (pid {pid})", { pid: job.pid ?? "?" }));
  const code = await job.wait();
  if (code === 0) {
    log.success(t("r.mapcalc finished with status {code}", { code }));
  } else {
    log.error(t("r.mapcalc finished with status {code}", { code }));
    process.exitCode = 1;
  }
}

async function historyCommand(args: ParsedArgs): Promise<void> {
  const map = requireArg(args.positional[0], "history <map>");
  if (await rasterHistory(map)) {
    log.success(t("History written for <{map}>", { map }));
  } else {
    process.exitCode = 1;
  }
}

function printHelp(): void {
  console.log(`
Usage:
  grass-raster info <map>                              Region, resolution and range of a raster map
  grass-raster what <map[,map...]> <east,north> ...   Values, labels and colours at points
  grass-raster mapcalc "<expression>" [name=value ...] Evaluate a map algebra expression
  grass-raster history <map>                           Record this command line in the map's history
  grass-raster --version                               Show version
  grass-raster --help                                  Show help

Options:
  --localized            (what) Translate the value/label/color keys
  --seed <n|auto>        (mapcalc) Seed for rand()
  --overwrite            (mapcalc) Allow replacing an existing output map
  --quiet, --verbose     (mapcalc) Module verbosity
  --async                (mapcalc) Start without blocking, then wait for the exit status

Expressions take $name placeholders, filled from name=value arguments:
  grass-raster mapcalc '"$out" = "$in" * 2' out=double in=elevation

Environment Variables:
  GIS_TOOL_DIR           Directory holding the GRASS module executables (default: PATH)
  GIS_TOOL_TIMEOUT       Timeout in ms for info/what/history (default: none)
  GIS_BRIDGE_LOCALE      Message language: en | de (default: from LANG)
  GIS_BRIDGE_DEBUG       Set to 1 to log every module invocation
  CMDLINE                History line recorded by "history" (default: this command line)
`);
}

// ─── Main ────────────────────────────────────────────────

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);

  if (command === "--version" || command === "-v") {
    console.log(`grass-raster v${getCurrentVersion()}`);
    return;
  }
  if (!command || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  const args = parseArgs(rest);
  if (loadConfig().debug) log.info(chalk.gray(`grass-raster v${getCurrentVersion()}`));

  switch (command) {
    case "info":
      return infoCommand(args);
    case "what":
      return whatCommand(args);
    case "mapcalc":
      return mapcalcCommand(args);
    case "history":
      return historyCommand(args);
    default:
      throw new Error(`Unknown command "${command}". Run grass-raster --help`);
  }
}

main().catch((err: unknown) => {
  stopSpinner();
  // Fatal messages have already been printed by the message channel
  if (!(err instanceof FatalError)) log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
