/**
 * ObjectReference Detector
 *
 * @module
 */

import type { KnownShapeContext, KnownShapeMatch } from "../interfaces.js";
import { BaseKnownShapeDetector } from "./base-detector.js";

const OBJECT_REFERENCE_PROPERTIES = [
  "apiVersion",
  "fieldPath",
  "kind",
  "name",
  "namespace",
  "resourceVersion",
  "uid",
] as const;

export class ObjectReferenceDetector extends BaseKnownShapeDetector {
  readonly shape = "object-reference" as const;

  detect({ node }: KnownShapeContext): KnownShapeMatch | null {
    if (node.kind !== "object" || !this.hasExactProperties(node, OBJECT_REFERENCE_PROPERTIES)) {
      return null;
    }
    return this.createMatch("object declares exactly the ObjectReference fields");
  }
}

export function createObjectReferenceDetector(): ObjectReferenceDetector {
  return new ObjectReferenceDetector();
}
