/**
 * Schema Module
 *
 * Typed Schema Model and the parser that produces it from decoded
 * `JSONSchemaProps` documents.
 */

export * from "./model.js";
export * from "./parser.js";
