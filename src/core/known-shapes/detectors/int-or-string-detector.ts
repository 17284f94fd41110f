/**
 * IntOrString Detector
 *
 * Matches `x-kubernetes-int-or-string` scalars and plain unions of an
 * integer and a string.
 *
 * @module
 */

import type { SchemaNode } from "../../schema/model.js";
import type { KnownShapeContext, KnownShapeMatch } from "../interfaces.js";
import { BaseKnownShapeDetector } from "./base-detector.js";

export class IntOrStringDetector extends BaseKnownShapeDetector {
  readonly shape = "int-or-string" as const;

  detect({ node }: KnownShapeContext): KnownShapeMatch | null {
    if (node.intOrString) {
      return this.createMatch("x-kubernetes-int-or-string is set");
    }
    if (node.kind === "union" && node.variants.length === 2 && this.isIntegerAndString(node.variants)) {
      return this.createMatch("union of an integer and a string");
    }
    return null;
  }

  private isIntegerAndString(variants: readonly SchemaNode[]): boolean {
    const plain = variants.filter((variant) => variant.kind === "scalar");
    return (
      plain.length === 2 &&
      plain.some((variant) => this.isScalar(variant, "integer")) &&
      plain.some((variant) => this.isScalar(variant, "string"))
    );
  }
}

export function createIntOrStringDetector(): IntOrStringDetector {
  return new IntOrStringDetector();
}
