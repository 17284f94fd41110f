/**
 * Known-Shape Detectors Module
 *
 * @module
 */

// Base
export { BaseKnownShapeDetector } from "./base-detector.js";

// Individual Detectors
export { ConditionDetector, createConditionDetector } from "./condition-detector.js";
export { ObjectReferenceDetector, createObjectReferenceDetector } from "./object-reference-detector.js";
export { IntOrStringDetector, createIntOrStringDetector } from "./int-or-string-detector.js";
export { ObjectMetaDetector, createObjectMetaDetector } from "./object-meta-detector.js";

import { createConditionDetector } from "./condition-detector.js";
import { createObjectReferenceDetector } from "./object-reference-detector.js";
import { createIntOrStringDetector } from "./int-or-string-detector.js";
import { createObjectMetaDetector } from "./object-meta-detector.js";
import type { IKnownShapeDetector } from "../interfaces.js";

/**
 * Create all default detectors, in the order they are consulted.
 */
export function createAllDetectors(): IKnownShapeDetector[] {
  return [
    createIntOrStringDetector(),
    createObjectMetaDetector(),
    createConditionDetector(),
    createObjectReferenceDetector(),
  ];
}
