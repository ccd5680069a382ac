/**
 * seed.ts — Seed derivation for r.mapcalc's rand()
 */

import { performance } from "node:perf_hooks";

export const SEED_LIMIT = 2 ** 32;

export interface SeedSource {
  pid?: number;
  /** Wall-clock milliseconds; fractional values are significant. */
  now?: number;
}

// 32-bit FNV-1a
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Derive a seed in [0, 2^32) from the process id and the current time. */
export function deriveSeed(source: SeedSource = {}): number {
  const pid = source.pid ?? process.pid;
  const now = source.now ?? performance.timeOrigin + performance.now();
  return fnv1a(`${pid}:${now}`) % SEED_LIMIT;
}

/** `"auto"` derives a fresh seed; anything else passes through unchanged. */
export function resolveSeed(seed: number | "auto" | undefined, source?: SeedSource): number | undefined {
  return seed === "auto" ? deriveSeed(source) : seed;
}
