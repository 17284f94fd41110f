/**
 * Type Graph Types
 *
 * The language-agnostic output model. References are generic over their
 * handle: the builder points at arena slots (`number`), the finished graph
 * at unique type names (`string`).
 *
 * @module
 */

import type { Literal } from "../schema/model.js";

// =============================================================================
// Type References
// =============================================================================

export type PrimitiveKind = "string" | "boolean" | "integer" | "number" | "date" | "date-time";

export type ExternalOrigin = "known-shape" | "override";

export type TypeRef<H = string> =
  | { kind: "primitive"; primitive: PrimitiveKind; format?: string }
  | { kind: "ref"; target: H; indirect: boolean }
  | { kind: "external"; name: string; origin: ExternalOrigin }
  | { kind: "unknown" }
  | { kind: "sequence"; of: TypeRef<H>; listType?: ListType }
  | { kind: "map"; of: TypeRef<H> }
  | { kind: "optional"; of: TypeRef<H> };

export const UNKNOWN_REF: TypeRef<never> = { kind: "unknown" };

export function primitiveRef(primitive: PrimitiveKind, format?: string): TypeRef<never> {
  return format === undefined ? { kind: "primitive", primitive } : { kind: "primitive", primitive, format };
}

export function externalRef(name: string, origin: ExternalOrigin): TypeRef<never> {
  return { kind: "external", name, origin };
}

/** How a sequence treats its items: in order, as a set, or keyed by list-map keys */
export type ListType = "atomic" | "set" | "map";

export function sequenceOf<H>(of: TypeRef<H>, listType?: ListType): TypeRef<H> {
  return listType === undefined ? { kind: "sequence", of } : { kind: "sequence", of, listType };
}

export function mapOf<H>(of: TypeRef<H>): TypeRef<H> {
  return { kind: "map", of };
}

export function optionalOf<H>(of: TypeRef<H>): TypeRef<H> {
  return of.kind === "optional" ? of : { kind: "optional", of };
}

/**
 * Rewrite every `ref` handle, keeping the shape of the reference.
 */
export function mapRefTargets<H, J>(ref: TypeRef<H>, fn: (target: H, indirect: boolean) => TypeRef<J>): TypeRef<J> {
  switch (ref.kind) {
    case "ref":
      return fn(ref.target, ref.indirect);
    case "sequence":
      return sequenceOf(mapRefTargets(ref.of, fn), ref.listType);
    case "map":
      return { kind: "map", of: mapRefTargets(ref.of, fn) };
    case "optional":
      return { kind: "optional", of: mapRefTargets(ref.of, fn) };
    default:
      return ref;
  }
}

/**
 * The innermost reference below sequence, map and optional wrappers.
 */
export function innermostRef<H>(ref: TypeRef<H>): TypeRef<H> {
  return ref.kind === "sequence" || ref.kind === "map" || ref.kind === "optional" ? innermostRef(ref.of) : ref;
}

/**
 * Compact human-readable rendering, used for summaries and structural keys.
 */
export function describeRef<H>(ref: TypeRef<H>): string {
  switch (ref.kind) {
    case "primitive":
      return ref.format ? `${ref.primitive}(${ref.format})` : ref.primitive;
    case "ref":
      return ref.indirect ? `&${String(ref.target)}` : String(ref.target);
    case "external":
      return `${ref.origin === "override" ? "!" : "@"}${ref.name}`;
    case "unknown":
      return "unknown";
    case "sequence":
      return ref.listType === undefined ? `${describeRef(ref.of)}[]` : `${describeRef(ref.of)}[${ref.listType}]`;
    case "map":
      return `map<string, ${describeRef(ref.of)}>`;
    case "optional":
      return `${describeRef(ref.of)}?`;
  }
}

// =============================================================================
// Capabilities
// =============================================================================

export type Capability = "equality" | "ordering" | "default" | "reflection" | "builder";

export const CAPABILITIES: readonly Capability[] = ["equality", "ordering", "default", "reflection", "builder"];

export function isCapability(value: string): value is Capability {
  return CAPABILITIES.some((capability) => capability === value);
}

export interface WithheldCapability {
  capability: Capability;
  reason: string;
}

// =============================================================================
// Generated Types
// =============================================================================

/**
 * How an absent value is represented for a field:
 * - `required`: always present
 * - `omit`: may be left out
 * - `empty`: always present, possibly as an empty container
 */
export type Absence = "required" | "omit" | "empty";

export type BuilderPolicy = "default-strip-optional" | "default" | "required";

export interface Field<H = string> {
  /** Property name as spelled in the schema */
  name: string;
  type: TypeRef<H>;
  optional: boolean;
  absence: Absence;
  description?: string;
  defaultValue?: unknown;
  builder?: BuilderPolicy;
}

interface GeneratedTypeBase {
  name: string;
  /** PascalCase segments from the resource kind down to this type */
  path: readonly string[];
  /** Nesting level, 0 for the root */
  level: number;
  description?: string;
  selfReferential: boolean;
  capabilities: Capability[];
  withheld: WithheldCapability[];
  elided: boolean;
}

export interface CompositeType<H = string> extends GeneratedTypeBase {
  kind: "composite";
  fields: Field<H>[];
}

export interface UnitVariant {
  name: string;
  /** The literal with its original spelling */
  literal: Literal;
}

export interface TaggedVariant<H = string> {
  name: string;
  type: TypeRef<H>;
  description?: string;
}

export interface UnitEnumType extends GeneratedTypeBase {
  kind: "enumerated";
  shape: "unit";
  variants: UnitVariant[];
}

export interface TaggedEnumType<H = string> extends GeneratedTypeBase {
  kind: "enumerated";
  shape: "tagged";
  variants: TaggedVariant<H>[];
}

export type EnumeratedType<H = string> = UnitEnumType | TaggedEnumType<H>;

export type GeneratedType<H = string> = CompositeType<H> | EnumeratedType<H>;

// =============================================================================
// Graph Metadata
// =============================================================================

export type MapRepresentation = "ordered" | "unordered";

export type SchemaMode = "disabled" | "manual" | "derived";

export interface TypeGraphMetadata {
  /** Resource kind, the name of the root type */
  kind: string;
  /** Operative version label, or the combined labels joined by "+" */
  version: string;
  mapRepresentation: MapRepresentation;
  schemaMode: SchemaMode;
  docs: boolean;
}
