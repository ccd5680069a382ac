/**
 * keyval.ts — Parser for the `key=value` text the GRASS modules print
 * under their shell-style output flags (-g, -n).
 */

export interface KeyValOptions {
  /** Separator between key and value. Default "=". */
  sep?: string;
  /** Separator between records. Default: line breaks. */
  vsep?: string;
  /** Value assigned to a record that has no separator. */
  defaultValue?: string;
}

export type KeyValRecord = Record<string, string | undefined>;

export function parseKeyVal(text: string, options: KeyValOptions = {}): KeyValRecord {
  const { sep = "=", vsep, defaultValue } = options;
  const result: KeyValRecord = {};
  if (!text) return result;

  const records = vsep ? text.split(vsep) : text.split(/\r?\n/);
  for (const record of records) {
    if (!record.trim()) continue;
    const idx = record.indexOf(sep);
    if (idx < 0) {
      result[record.trim()] = defaultValue;
    } else {
      result[record.slice(0, idx).trim()] = record.slice(idx + sep.length).trim();
    }
  }
  return result;
}
