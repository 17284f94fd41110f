/**
 * Structural schema matching for property overrides.
 *
 * Only what affects the generated type is compared: node kinds, scalar kinds
 * and formats, property names, required names, enum literals and the
 * Kubernetes extension flags. Descriptions, defaults and titles are ignored.
 *
 * @module
 */

import type { SchemaNode } from "../schema/model.js";

export type SchemaMatchMode = "subset" | "exhaustive";

type Visited = Map<SchemaNode, Set<SchemaNode>>;

/**
 * Pairs already under comparison count as matching, so cyclic schemas
 * terminate.
 */
function enter(visited: Visited, pattern: SchemaNode, target: SchemaNode): boolean {
  let targets = visited.get(pattern);
  if (!targets) {
    targets = new Set();
    visited.set(pattern, targets);
  }
  if (targets.has(target)) return false;
  targets.add(target);
  return true;
}

function isSubset(pattern: SchemaNode, target: SchemaNode, visited: Visited): boolean {
  if (!enter(visited, pattern, target)) return true;

  if (pattern.intOrString && !target.intOrString) return false;
  if (pattern.preserveUnknownFields && !target.preserveUnknownFields) return false;

  switch (pattern.kind) {
    case "unknown":
      return true;
    case "scalar":
      return (
        target.kind === "scalar" &&
        target.scalar === pattern.scalar &&
        (pattern.format === undefined || pattern.format === target.format)
      );
    case "enumeration":
      return target.kind === "enumeration" && pattern.literals.every((literal) => target.literals.includes(literal));
    case "array":
      return target.kind === "array" && isSubset(pattern.items, target.items, visited);
    case "map":
      return target.kind === "map" && isSubset(pattern.value, target.value, visited);
    case "union":
      return (
        target.kind === "union" &&
        pattern.variants.every((variant) => target.variants.some((candidate) => isSubset(variant, candidate, visited)))
      );
    case "object": {
      if (pattern.properties.size === 0) {
        // A bare `type: object` matches any object-like schema
        return target.kind === "object" || target.kind === "map" || target.kind === "unknown";
      }
      if (target.kind !== "object") return false;
      for (const name of pattern.required) {
        if (!target.required.has(name)) return false;
      }
      for (const [name, child] of pattern.properties) {
        const candidate = target.properties.get(name);
        if (!candidate || !isSubset(child, candidate, visited)) return false;
      }
      return true;
    }
  }
}

function sameSet<T>(left: Iterable<T>, right: ReadonlySet<T>): boolean {
  const values = new Set(left);
  return values.size === right.size && [...values].every((value) => right.has(value));
}

function isExhaustive(pattern: SchemaNode, target: SchemaNode, visited: Visited): boolean {
  if (!enter(visited, pattern, target)) return true;

  if (
    pattern.kind !== target.kind ||
    pattern.intOrString !== target.intOrString ||
    pattern.preserveUnknownFields !== target.preserveUnknownFields ||
    pattern.nullable !== target.nullable
  ) {
    return false;
  }

  switch (pattern.kind) {
    case "unknown":
      return true;
    case "scalar":
      return target.kind === "scalar" && target.scalar === pattern.scalar && target.format === pattern.format;
    case "enumeration":
      return (
        target.kind === "enumeration" &&
        target.scalar === pattern.scalar &&
        sameSet(pattern.literals, new Set(target.literals))
      );
    case "array":
      return target.kind === "array" && isExhaustive(pattern.items, target.items, visited);
    case "map":
      return target.kind === "map" && isExhaustive(pattern.value, target.value, visited);
    case "union":
      return (
        target.kind === "union" &&
        pattern.variants.length === target.variants.length &&
        pattern.variants.every((variant, index) => {
          const candidate = target.variants[index];
          return candidate !== undefined && isExhaustive(variant, candidate, visited);
        })
      );
    case "object": {
      if (target.kind !== "object") return false;
      if (!sameSet(pattern.properties.keys(), new Set(target.properties.keys()))) return false;
      if (!sameSet(pattern.required, target.required)) return false;
      for (const [name, child] of pattern.properties) {
        const candidate = target.properties.get(name);
        if (!candidate || !isExhaustive(child, candidate, visited)) return false;
      }
      return true;
    }
  }
}

/**
 * Whether `target` matches `pattern` under the given mode.
 */
export function matchesSchema(mode: SchemaMatchMode, pattern: SchemaNode, target: SchemaNode): boolean {
  const visited: Visited = new Map();
  return mode === "subset" ? isSubset(pattern, target, visited) : isExhaustive(pattern, target, visited);
}
