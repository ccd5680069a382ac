/**
 * messages.ts — Message catalog lookup
 *
 * Source strings are English and double as catalog keys. Other locales live
 * in locales/<locale>.json; a missing entry falls back to the source string.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { resolveLocale } from "../config.js";
import { defaultLocale, type Locale } from "./config.js";

type Catalog = Record<string, string>;

// Same relative depth from src/i18n and dist/i18n
const LOCALES_DIR = fileURLToPath(new URL("../../locales/", import.meta.url));

const catalogs = new Map<Locale, Catalog>();

function loadCatalog(locale: Locale): Catalog {
  const cached = catalogs.get(locale);
  if (cached) return cached;

  const catalog: Catalog = {};
  if (locale !== defaultLocale) {
    const raw: unknown = JSON.parse(readFileSync(`${LOCALES_DIR}${locale}.json`, "utf-8"));
    if (raw && typeof raw === "object") {
      for (const [key, value] of Object.entries(raw)) {
        if (typeof value === "string") catalog[key] = value;
      }
    }
  }
  catalogs.set(locale, catalog);
  return catalog;
}

/**
 * Translate a message and fill its `{name}` placeholders.
 *
 * @example t("Raster map <{map}> not found", { map: "elevation" })
 */
export function t(
  message: string,
  params: Record<string, string | number> = {},
  locale: Locale = resolveLocale(),
): string {
  const template = loadCatalog(locale)[message] ?? message;
  return template.replace(/\{(\w+)\}/g, (match: string, name: string) =>
    name in params ? String(params[name]) : match,
  );
}
