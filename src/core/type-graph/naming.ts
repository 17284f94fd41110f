/**
 * Identifier helpers shared by the builder and the resolver.
 *
 * @module
 */

import type { Literal } from "../schema/model.js";

/**
 * PascalCase a schema property name, keeping existing humps:
 * `matchLabels` → `MatchLabels`, `tls_config` → `TlsConfig`.
 */
export function pascalCase(value: string): string {
  return value
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

const SPECIAL_LITERALS: Readonly<Record<string, string>> = {
  "": "Empty",
  "-": "Dash",
  _: "Underscore",
};

/**
 * Identifier for a unit enumeration variant. `taken` holds the names already
 * given out in the same enumeration and is updated.
 */
export function enumVariantName(literal: Literal, taken: Set<string>): string {
  const text = String(literal);
  let name = SPECIAL_LITERALS[text] ?? pascalCase(text);
  if (!/^[A-Za-z]/.test(name)) {
    name = `Value${name}`;
  }
  while (taken.has(name)) {
    name = `${name}X`;
  }
  taken.add(name);
  return name;
}

/**
 * Whether a string can be used as a type name as is.
 */
export function isTypeName(value: string): boolean {
  return /^[A-Z][A-Za-z0-9]*$/.test(value);
}
