/**
 * Known-Shape Module
 *
 * Recognizes Condition arrays, ObjectReferences, int-or-string values and
 * the root ObjectMeta, which are referenced rather than synthesized.
 *
 * @module
 */

export * from "./interfaces.js";
export * from "./detectors/index.js";
export { KnownShapeService, createKnownShapeService, type KnownShapeServiceOptions } from "./service.js";
