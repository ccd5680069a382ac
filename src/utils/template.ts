/**
 * template.ts — `$name` placeholder substitution for r.mapcalc expressions
 *
 * Syntax:
 *   $$        literal "$"
 *   $name     binding "name" (letters, digits, underscore; not starting with a digit)
 *   ${name}   same, for names followed directly by identifier characters
 */

import { TemplateError } from "../errors.js";

export type TemplateBindings = Readonly<Record<string, string | number>>;

const PLACEHOLDER = /\$(?:(\$)|([_a-zA-Z][_a-zA-Z0-9]*)|\{([_a-zA-Z][_a-zA-Z0-9]*)\}|())/g;

function position(template: string, offset: number): { line: number; column: number } {
  const before = template.slice(0, offset);
  const lines = before.split("\n");
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}

/**
 * Substitute every placeholder exactly once. Substituted text is not
 * scanned again, so a binding containing "$" is inserted as-is.
 *
 * @throws TemplateError for a placeholder without a binding, or a "$" that
 *   starts no valid placeholder
 */
export function substitute(template: string, bindings: TemplateBindings = {}): string {
  return template.replace(
    PLACEHOLDER,
    (
      match: string,
      escaped: string | undefined,
      named: string | undefined,
      braced: string | undefined,
      invalid: string | undefined,
      offset: number,
    ) => {
      if (escaped !== undefined) return "$";
      const name = named ?? braced;
      if (name !== undefined) {
        if (!Object.prototype.hasOwnProperty.call(bindings, name)) {
          throw new TemplateError(`No binding for placeholder "$${name}"`, name);
        }
        return String(bindings[name]);
      }
      if (invalid !== undefined) {
        const { line, column } = position(template, offset);
        throw new TemplateError(`Invalid placeholder in template: line ${line}, col ${column}`);
      }
      return match;
    },
  );
}

/** Names of all placeholders in a template, in order of first appearance. */
export function placeholders(template: string): string[] {
  const names: string[] = [];
  for (const m of template.matchAll(PLACEHOLDER)) {
    const name = m[2] ?? m[3];
    if (name !== undefined && !names.includes(name)) names.push(name);
  }
  return names;
}
