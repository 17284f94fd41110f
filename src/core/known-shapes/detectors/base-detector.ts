/**
 * Base Known-Shape Detector
 *
 * Provides common functionality for all known-shape detectors.
 *
 * @module
 */

import type { ObjectNode, ScalarKind, SchemaNode } from "../../schema/model.js";
import { externalRef } from "../../type-graph/types.js";
import {
  KNOWN_SHAPE_TYPES,
  type IKnownShapeDetector,
  type KnownShapeContext,
  type KnownShapeMatch,
  type KnownShapeName,
} from "../interfaces.js";

export abstract class BaseKnownShapeDetector implements IKnownShapeDetector {
  abstract readonly shape: KnownShapeName;

  abstract detect(context: KnownShapeContext): KnownShapeMatch | null;

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  protected createMatch(reason: string): KnownShapeMatch {
    return {
      shape: this.shape,
      ref: externalRef(KNOWN_SHAPE_TYPES[this.shape], "known-shape"),
      reason,
    };
  }

  /**
   * Whether an object declares every one of the given property names.
   */
  protected hasProperties(node: ObjectNode, names: readonly string[]): boolean {
    return names.every((name) => node.properties.has(name));
  }

  /**
   * Whether the object's property names are exactly the given set.
   */
  protected hasExactProperties(node: ObjectNode, names: readonly string[]): boolean {
    return node.properties.size === names.length && this.hasProperties(node, names);
  }

  protected isScalar(node: SchemaNode | undefined, scalar: ScalarKind): boolean {
    return node !== undefined && (node.kind === "scalar" || node.kind === "enumeration") && node.scalar === scalar;
  }
}
