/**
 * Structural keys for deduplicating generated types.
 *
 * Two types with the same key are interchangeable: same kind, and the same
 * order-insensitive set of (field name, type, optionality) triples, literals
 * or variants. Names, paths and descriptions do not take part.
 *
 * @module
 */

import { describeRef, mapRefTargets, type GeneratedType, type TypeRef } from "../type-graph/types.js";
import { stableStringify } from "../../utils/index.js";

function canonicalRef(ref: TypeRef<number>, canonical: (id: number) => number): string {
  return describeRef(mapRefTargets(ref, (target, indirect) => ({ kind: "ref", target: canonical(target), indirect })));
}

export function structuralKey(type: GeneratedType<number>, canonical: (id: number) => number): string {
  switch (type.kind) {
    case "composite": {
      const triples = type.fields
        .map((field) => `${JSON.stringify(field.name)}:${canonicalRef(field.type, canonical)}:${field.optional}`)
        .sort();
      return `composite{${triples.join(",")}}`;
    }
    case "enumerated": {
      if (type.shape === "unit") {
        const literals = type.variants.map((variant) => stableStringify(variant.literal)).sort();
        return `unit{${literals.join(",")}}`;
      }
      const variants = type.variants
        .map((variant) => `${variant.name}=${canonicalRef(variant.type, canonical)}`)
        .sort();
      return `tagged{${variants.join(",")}}`;
    }
  }
}
