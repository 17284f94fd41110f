/**
 * Property Overrides Module
 *
 * Name- and schema-directed rules that replace or omit properties.
 *
 * @module
 */

export { PropertyOverrides, type PropertyAction } from "./property-overrides.js";
export { matchesSchema, type SchemaMatchMode } from "./schema-match.js";
export { parseOverrides, loadOverrides } from "./loader.js";
