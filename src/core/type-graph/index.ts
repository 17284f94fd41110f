/**
 * Type Graph Module
 *
 * Output model of the analyzer: composite and enumerated types addressed by
 * unique names.
 */

export * from "./types.js";
export * from "./naming.js";
export * from "./type-graph.js";
