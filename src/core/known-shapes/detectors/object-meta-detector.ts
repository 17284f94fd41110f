/**
 * ObjectMeta Detector
 *
 * The root `metadata` property of a resource is always the standard
 * ObjectMeta, whatever the schema says about it.
 *
 * @module
 */

import type { KnownShapeContext, KnownShapeMatch } from "../interfaces.js";
import { BaseKnownShapeDetector } from "./base-detector.js";

export class ObjectMetaDetector extends BaseKnownShapeDetector {
  readonly shape = "object-meta" as const;

  detect({ node, propertyName, level }: KnownShapeContext): KnownShapeMatch | null {
    if (level !== 0 || propertyName !== "metadata" || node.kind !== "object") {
      return null;
    }
    return this.createMatch("metadata property of the root object");
  }
}

export function createObjectMetaDetector(): ObjectMetaDetector {
  return new ObjectMetaDetector();
}
