/**
 * formatter.ts — Result formatting
 *
 * Converts bridge results into human-readable text for terminal display.
 */

import chalk from "chalk";
import type { RasterInfo, LocalizedSamplePoint } from "../bridge/raster.js";

const INFO_ORDER = ["north", "south", "east", "west", "nsres", "ewres", "rows", "cols", "min", "max"];

function formatValue(value: string | number | null | undefined): string {
  if (value === null) return chalk.gray("NULL");
  if (value === undefined) return chalk.gray("—");
  return String(value);
}

/**
 * Region and range fields first, in a fixed order; everything else after,
 * in the order r.info printed it.
 */
export function formatRasterInfo(info: RasterInfo): string {
  const keys = [
    ...INFO_ORDER.filter((k) => k in info),
    ...Object.keys(info).filter((k) => !INFO_ORDER.includes(k)),
  ];
  const width = Math.max(...keys.map((k) => k.length));
  return keys
    .map((k) => `  ${chalk.bold(k.padEnd(width))}  ${formatValue(info[k])}`)
    .join("\n");
}

/**
 * One block per point; inner keys are printed as given, so localized
 * labels show up translated.
 */
export function formatSamplePoints(
  points: readonly LocalizedSamplePoint[],
  coordinates: readonly (readonly [number, number])[],
): string {
  return points
    .map((point, i) => {
      const coord = coordinates[i];
      const header = coord ? chalk.cyan.bold(`${coord[0]}, ${coord[1]}`) : chalk.cyan.bold(`#${i + 1}`);
      const rows = Object.entries(point).map(([map, fields]) => {
        const detail = Object.entries(fields)
          .map(([key, value]) => `${chalk.gray(key + "=")}${value}`)
          .join("  ");
        return `  ${chalk.magenta(map)}  ${detail}`;
      });
      return [header, ...rows].join("\n");
    })
    .join("\n");
}
