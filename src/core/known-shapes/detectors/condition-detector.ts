/**
 * Condition Detector
 *
 * Matches `conditions` arrays of the standard metav1.Condition shape.
 *
 * @module
 */

import { sequenceOf } from "../../type-graph/types.js";
import type { KnownShapeContext, KnownShapeMatch } from "../interfaces.js";
import { BaseKnownShapeDetector } from "./base-detector.js";

const CONDITION_PROPERTIES = ["type", "status", "reason", "message", "lastTransitionTime"] as const;

export class ConditionDetector extends BaseKnownShapeDetector {
  readonly shape = "condition" as const;

  detect({ node, propertyName }: KnownShapeContext): KnownShapeMatch | null {
    if (propertyName !== "conditions" || node.kind !== "array") {
      return null;
    }
    const items = node.items;
    if (items.kind !== "object" || !this.hasProperties(items, CONDITION_PROPERTIES)) {
      return null;
    }
    // Either no required list at all, or one that includes the identifying pair
    if (items.required.size > 0 && !(items.required.has("type") && items.required.has("status"))) {
      return null;
    }
    const match = this.createMatch("conditions items declare type, status, reason, message and lastTransitionTime");
    // The whole array is replaced, not its items
    return { ...match, ref: sequenceOf(match.ref, node.listType) };
  }
}

export function createConditionDetector(): ConditionDetector {
  return new ConditionDetector();
}
