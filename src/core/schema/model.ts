/**
 * Schema Model
 *
 * Typed representation of a structural (OpenAPI v3 / CRD) schema. Everything
 * the analyzer looks at is expressed here; the loosely typed source document
 * never reaches the graph builder.
 *
 * Nodes are immutable once the parser hands them out. Shared and recursive
 * subtrees are the same node object, so object identity is structural
 * identity.
 *
 * @module
 */

// =============================================================================
// Scalars and Literals
// =============================================================================

export type ScalarKind = "string" | "integer" | "number" | "boolean";

export const SCALAR_KINDS: readonly ScalarKind[] = ["string", "integer", "number", "boolean"];

/**
 * A literal value allowed by an `enum` or `const`.
 */
export type Literal = string | number | boolean;

// =============================================================================
// Nodes
// =============================================================================

/**
 * Flags shared by every node kind.
 */
export interface SchemaFlags {
  readonly nullable: boolean;
  /** x-kubernetes-int-or-string */
  readonly intOrString: boolean;
  /** x-kubernetes-preserve-unknown-fields */
  readonly preserveUnknownFields: boolean;
  /** x-kubernetes-embedded-resource */
  readonly embeddedResource: boolean;
  readonly description?: string;
  readonly title?: string;
  /** The schema's `default`, kept verbatim */
  readonly defaultValue?: unknown;
}

export interface ScalarNode extends SchemaFlags {
  readonly kind: "scalar";
  readonly scalar: ScalarKind;
  readonly format?: string;
}

export interface ObjectNode extends SchemaFlags {
  readonly kind: "object";
  /** Iteration order is the field order of the generated type */
  readonly properties: ReadonlyMap<string, SchemaNode>;
  readonly required: ReadonlySet<string>;
}

export interface ArrayNode extends SchemaFlags {
  readonly kind: "array";
  readonly items: SchemaNode;
  /** x-kubernetes-list-type */
  readonly listType?: "atomic" | "set" | "map";
}

/**
 * An open object: `additionalProperties` with a value schema.
 */
export interface MapNode extends SchemaFlags {
  readonly kind: "map";
  readonly value: SchemaNode;
}

export interface UnionNode extends SchemaFlags {
  readonly kind: "union";
  readonly combinator: "oneOf" | "anyOf";
  readonly variants: readonly SchemaNode[];
}

export interface EnumerationNode extends SchemaFlags {
  readonly kind: "enumeration";
  readonly scalar: ScalarKind;
  readonly literals: readonly Literal[];
}

/**
 * Schema-less value (preserve-unknown-fields, or an object with no shape).
 */
export interface UnknownNode extends SchemaFlags {
  readonly kind: "unknown";
}

export type SchemaNode =
  | ScalarNode
  | ObjectNode
  | ArrayNode
  | MapNode
  | UnionNode
  | EnumerationNode
  | UnknownNode;

export type SchemaNodeKind = SchemaNode["kind"];

// =============================================================================
// Constructors
// =============================================================================

export const DEFAULT_FLAGS: SchemaFlags = {
  nullable: false,
  intOrString: false,
  preserveUnknownFields: false,
  embeddedResource: false,
};

/**
 * Flag overrides accepted by the node constructors.
 */
export type FlagInput = Partial<SchemaFlags>;

export function scalarNode(scalar: ScalarKind, flags: FlagInput & { format?: string } = {}): ScalarNode {
  return { ...DEFAULT_FLAGS, ...flags, kind: "scalar", scalar };
}

export function objectNode(
  properties: Iterable<readonly [string, SchemaNode]>,
  required: Iterable<string> = [],
  flags: FlagInput = {}
): ObjectNode {
  const props = new Map(properties);
  const req = new Set([...required].filter((name) => props.has(name)));
  return { ...DEFAULT_FLAGS, ...flags, kind: "object", properties: props, required: req };
}

export function arrayNode(items: SchemaNode, flags: FlagInput & { listType?: ArrayNode["listType"] } = {}): ArrayNode {
  return { ...DEFAULT_FLAGS, ...flags, kind: "array", items };
}

export function mapNode(value: SchemaNode, flags: FlagInput = {}): MapNode {
  return { ...DEFAULT_FLAGS, ...flags, kind: "map", value };
}

export function unionNode(
  variants: readonly SchemaNode[],
  combinator: UnionNode["combinator"] = "oneOf",
  flags: FlagInput = {}
): UnionNode {
  return { ...DEFAULT_FLAGS, ...flags, kind: "union", combinator, variants };
}

export function enumerationNode(
  literals: readonly Literal[],
  scalar: ScalarKind = "string",
  flags: FlagInput = {}
): EnumerationNode {
  return { ...DEFAULT_FLAGS, ...flags, kind: "enumeration", scalar, literals };
}

export function unknownNode(flags: FlagInput = {}): UnknownNode {
  return { ...DEFAULT_FLAGS, ...flags, kind: "unknown" };
}

// =============================================================================
// Guards
// =============================================================================

export function isScalarKind(value: unknown): value is ScalarKind {
  return typeof value === "string" && SCALAR_KINDS.some((kind) => kind === value);
}

export function isNodeKind<K extends SchemaNodeKind>(
  node: SchemaNode,
  kind: K
): node is Extract<SchemaNode, { kind: K }> {
  return node.kind === kind;
}

export function isLiteral(value: unknown): value is Literal {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}
