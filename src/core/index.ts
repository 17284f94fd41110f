/**
 * Core module - schema analysis shared by the CLI and library consumers
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./schema/index.js";
export * from "./type-graph/index.js";
export * from "./known-shapes/index.js";
export * from "./overrides/index.js";
export * from "./graph-builder/index.js";
export * from "./reconciliation/index.js";
export * from "./derivation/index.js";
export * from "./crd/index.js";

// Pipeline
export { parseConfig, type SynthesisConfig, type SynthesisConfigInput } from "./config.js";
export { synthesize, type SynthesisInput } from "./synthesis.js";

// Re-export types
export * from "../types/result.js";
