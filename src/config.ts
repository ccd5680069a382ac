/**
 * config.ts — Environment-driven runtime configuration
 *
 * Read per call so that a changed environment (or a test-supplied one)
 * takes effect without restarting.
 */

import { defaultLocale, isLocale, type Locale } from "./i18n/config.js";

export interface BridgeConfig {
  /** Timeout for tools whose output is captured; 0 disables it. */
  toolTimeoutMs: number;
  /** Directory prefixed to tool names; empty means resolve through PATH. */
  toolDir: string;
  locale: Locale;
  debug: boolean;
  /** Command line of the invocation, recorded as raster history. */
  commandLine?: string;
}

type Env = Record<string, string | undefined>;

/** "de_DE.UTF-8" → "de"; unknown languages fall back to the default locale. */
export function resolveLocale(env: Env = process.env): Locale {
  const raw = env.GIS_BRIDGE_LOCALE || env.LC_ALL || env.LANG || "";
  const lang = raw.split(/[_.@-]/)[0].toLowerCase();
  return isLocale(lang) ? lang : defaultLocale;
}

export function loadConfig(env: Env = process.env): BridgeConfig {
  const timeout = Number(env.GIS_TOOL_TIMEOUT);
  return {
    toolTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : 0,
    toolDir: env.GIS_TOOL_DIR?.trim() || "",
    locale: resolveLocale(env),
    debug: env.GIS_BRIDGE_DEBUG === "1" || env.GIS_BRIDGE_DEBUG === "true",
    commandLine: env.CMDLINE || undefined,
  };
}
