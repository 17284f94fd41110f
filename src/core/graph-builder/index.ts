/**
 * Graph Builder Module
 *
 * Turns a Schema Model into a Type Graph.
 *
 * @module
 */

export { TypeGraphBuilder, buildTypeGraph } from "./type-graph-builder.js";
export { structuralKey } from "./structural-hash.js";
export { DEFAULT_BUILD_OPTIONS, type BuildOptions } from "./interfaces.js";
