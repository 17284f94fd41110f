/**
 * Known-Shape Detection Interfaces
 *
 * Types for recognizing schema subtrees that match well-known Kubernetes
 * API types, so they can be referenced instead of synthesized.
 *
 * @module
 */

import type { SchemaNode } from "../schema/model.js";
import type { TypeRef } from "../type-graph/types.js";

// =============================================================================
// Shapes
// =============================================================================

export type KnownShapeName = "condition" | "object-reference" | "int-or-string" | "object-meta";

/**
 * Shapes the user can switch off. int-or-string has no generated fallback
 * and is always substituted.
 */
export type SuppressibleShape = Exclude<KnownShapeName, "int-or-string">;

/**
 * Canonical external type for each shape.
 */
export const KNOWN_SHAPE_TYPES: Readonly<Record<KnownShapeName, string>> = {
  condition: "Condition",
  "object-reference": "ObjectReference",
  "int-or-string": "IntOrString",
  "object-meta": "ObjectMeta",
};

// =============================================================================
// Detection
// =============================================================================

/**
 * A node about to be turned into a field type.
 */
export interface KnownShapeContext {
  node: SchemaNode;
  /** Property holding the node; absent for array items, map values and union variants */
  propertyName?: string;
  /** Nesting level of the composite that owns the property (0 = root) */
  level: number;
}

export interface KnownShapeMatch {
  shape: KnownShapeName;
  /** Reference that replaces the subtree */
  ref: TypeRef<never>;
  /** Why the detector matched, for debug logs */
  reason: string;
}

/**
 * Interface for individual shape detectors.
 */
export interface IKnownShapeDetector {
  readonly shape: KnownShapeName;

  detect(context: KnownShapeContext): KnownShapeMatch | null;
}

/**
 * Runs the registered detectors in order; the first match wins.
 */
export interface IKnownShapeService {
  detect(context: KnownShapeContext): KnownShapeMatch | null;
  getDetectors(): IKnownShapeDetector[];
  isSuppressed(shape: KnownShapeName): boolean;
}
