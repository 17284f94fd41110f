/**
 * Schema Parser
 *
 * Converts a loosely typed `JSONSchemaProps` document (as produced by a YAML
 * or JSON decoder) into the Schema Model. All duck typing of the source
 * document happens here.
 *
 * - local `$ref`s (`#/definitions/X`, `#/$defs/X`) are followed
 * - `allOf` branches are merged into a single node
 * - `oneOf`/`anyOf` lists that only add validation (`required`, bounds) are
 *   ignored
 * - the same source object always yields the same node, so YAML aliases and
 *   recursive definitions come out as shared or cyclic subtrees
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { isRecord, stableStringify } from "../../utils/index.js";
import { tryCatch, type Result } from "../../types/result.js";
import {
  AnalysisError,
  CycleDepthExceededError,
  UnsupportedSchemaConstructError,
  isAnalysisError,
  toDiagnostic,
  type Diagnostic,
} from "../errors.js";
import {
  DEFAULT_FLAGS,
  enumerationNode,
  isLiteral,
  isScalarKind,
  scalarNode,
  unknownNode,
  type ArrayNode,
  type FlagInput,
  type Literal,
  type MapNode,
  type ObjectNode,
  type ScalarKind,
  type SchemaNode,
  type UnionNode,
} from "./model.js";

const logger = createLogger("schema-parser");

// =============================================================================
// Types
// =============================================================================

/**
 * A schema object as it comes out of the document decoder.
 */
export type RawSchema = Record<string, unknown>;

export interface ParseOptions {
  /** Downgrade unsupported constructs to diagnostics (default: false) */
  relaxed?: boolean;
  /** Maximum nesting depth (default: 64) */
  maxDepth?: number;
  /** Document that local `$ref`s resolve against (default: the schema itself) */
  document?: unknown;
  /** Prefix for the paths of reported errors */
  path?: readonly string[];
}

export interface ParsedSchema {
  root: SchemaNode;
  diagnostics: Diagnostic[];
}

export const DEFAULT_MAX_DEPTH = 64;

const INT_OR_STRING = "x-kubernetes-int-or-string";
const PRESERVE_UNKNOWN_FIELDS = "x-kubernetes-preserve-unknown-fields";
const EMBEDDED_RESOURCE = "x-kubernetes-embedded-resource";
const LIST_TYPE = "x-kubernetes-list-type";

/**
 * Keys that give a schema a shape. A union branch without any of them only
 * adds validation.
 */
const SHAPE_KEYS = [
  "type",
  "properties",
  "items",
  "additionalProperties",
  "enum",
  "const",
  "$ref",
  "allOf",
  "oneOf",
  "anyOf",
  INT_OR_STRING,
  PRESERVE_UNKNOWN_FIELDS,
] as const;

type Draft<T> = { -readonly [K in keyof T]: T[K] };

// =============================================================================
// Helpers
// =============================================================================

function readFlags(raw: RawSchema): FlagInput {
  return {
    nullable: raw.nullable === true,
    intOrString: raw[INT_OR_STRING] === true,
    preserveUnknownFields: raw[PRESERVE_UNKNOWN_FIELDS] === true,
    embeddedResource: raw[EMBEDDED_RESOURCE] === true,
    description: typeof raw.description === "string" ? raw.description : undefined,
    title: typeof raw.title === "string" ? raw.title : undefined,
    defaultValue: raw.default,
  };
}

function isIntegerLike(key: string): boolean {
  return /^(0|[1-9]\d*)$/.test(key);
}

/**
 * Declared order, unless an integer-like key means the decoder has already
 * reordered the object.
 */
function orderedKeys(properties: RawSchema): string[] {
  const keys = Object.keys(properties);
  return keys.some(isIntegerLike) ? [...keys].sort() : keys;
}

function hasShape(raw: RawSchema): boolean {
  return SHAPE_KEYS.some((key) => raw[key] !== undefined);
}

/**
 * Whether a union branch next to an inline structure contributes shape of
 * its own rather than constraining the properties `owner` declares.
 */
function addsStructure(branch: RawSchema, owner: RawSchema): boolean {
  if (branch.type !== undefined || branch.enum !== undefined || branch.const !== undefined || branch.$ref !== undefined) {
    return true;
  }
  const declared = isRecord(owner.properties) ? owner.properties : {};
  return isRecord(branch.properties) && Object.keys(branch.properties).some((name) => !Object.hasOwn(declared, name));
}

function isNullBranch(raw: RawSchema): boolean {
  return raw.type === "null" && Object.keys(raw).every((key) => key === "type" || key === "description");
}

function inferScalar(literal: Literal | undefined): ScalarKind {
  if (typeof literal === "boolean") return "boolean";
  if (typeof literal === "number") return Number.isInteger(literal) ? "integer" : "number";
  return "string";
}

function readStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function readListType(raw: RawSchema): ArrayNode["listType"] {
  const listType = raw[LIST_TYPE];
  return listType === "atomic" || listType === "set" || listType === "map" ? listType : undefined;
}

/**
 * Split a `type` keyword into its non-null types and whether `null` was
 * among them.
 */
function readTypes(raw: RawSchema): { types: string[]; nullable: boolean } {
  const declared = typeof raw.type === "string" ? [raw.type] : readStrings(raw.type);
  return {
    types: declared.filter((type) => type !== "null"),
    nullable: declared.includes("null") && declared.length > 1,
  };
}

function unescapePointerSegment(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

// =============================================================================
// Parser
// =============================================================================

class SchemaParser {
  private readonly memo = new WeakMap<object, SchemaNode>();
  private readonly diagnostics: Diagnostic[] = [];

  constructor(
    private readonly document: unknown,
    private readonly relaxed: boolean,
    private readonly maxDepth: number
  ) {}

  parse(raw: unknown, path: readonly string[]): ParsedSchema {
    const root = this.parseNode(raw, path, 0);
    return { root, diagnostics: this.diagnostics };
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  private parseNode(raw: unknown, path: readonly string[], depth: number, inheritedType?: unknown): SchemaNode {
    if (depth > this.maxDepth) {
      throw new CycleDepthExceededError(path, this.maxDepth);
    }
    if (raw === true) {
      return unknownNode();
    }
    if (!isRecord(raw)) {
      this.report(new UnsupportedSchemaConstructError("schema node is not an object", path));
      return unknownNode();
    }

    const resolved = this.deref(raw, path);
    if (!resolved) {
      return unknownNode();
    }

    const cached = this.memo.get(resolved);
    if (cached) {
      return cached;
    }

    if (inheritedType !== undefined && resolved.type === undefined && resolved.$ref === undefined) {
      return this.parseRecord({ ...resolved, type: inheritedType }, path, depth, []);
    }
    return this.parseRecord(resolved, path, depth, []);
  }

  /**
   * @param aliases - source objects that stand for the same node (the
   *   original of a merged `allOf`)
   */
  private parseRecord(raw: RawSchema, path: readonly string[], depth: number, aliases: object[]): SchemaNode {
    const keys = [raw, ...aliases];
    const flags = readFlags(raw);

    if (Array.isArray(raw.allOf)) {
      return this.parseAllOf(raw, raw.allOf, path, depth, keys);
    }

    if (flags.intOrString) {
      return this.register(keys, scalarNode("string", flags));
    }

    const combinator = Array.isArray(raw.oneOf) ? "oneOf" : Array.isArray(raw.anyOf) ? "anyOf" : undefined;
    const branches = combinator === "oneOf" ? raw.oneOf : combinator === "anyOf" ? raw.anyOf : undefined;
    if (combinator && Array.isArray(branches)) {
      const shaped = branches.some((branch) => {
        const resolved = isRecord(branch) ? this.deref(branch, path) : undefined;
        return resolved !== undefined && hasShape(resolved);
      });
      const inline = raw.properties !== undefined || raw.items !== undefined || raw.additionalProperties !== undefined;
      if (shaped && !inline) {
        return this.parseUnion(raw, combinator, branches, path, depth, keys, flags);
      }
      // Beside an inline structure, branches that only constrain declared properties are validation
      if (shaped && branches.some((branch) => isRecord(branch) && addsStructure(branch, raw))) {
        this.report(new UnsupportedSchemaConstructError(`${combinator} alongside an inline structure`, path));
      }
    }

    const { types, nullable } = readTypes(raw);
    const withNull = nullable ? { ...flags, nullable: true } : flags;

    if ((raw.enum !== undefined || raw.const !== undefined) && (types.length === 0 || isScalarKind(types[0]))) {
      return this.register(keys, this.parseEnumeration(raw, types[0], path, withNull));
    }

    if (types.length > 1) {
      return this.parseTypeList(raw, types, path, depth, keys, withNull);
    }

    const type = types[0];
    if (type === "object") {
      return this.parseObject(raw, path, depth, keys, withNull);
    }
    if (type === "array") {
      return this.parseArray(raw, path, depth, keys, withNull);
    }
    if (type !== undefined) {
      if (isScalarKind(type)) {
        const format = typeof raw.format === "string" ? raw.format : undefined;
        return this.register(keys, scalarNode(type, { ...withNull, format }));
      }
      this.report(new UnsupportedSchemaConstructError(`unsupported type "${type}"`, path));
      return this.register(keys, unknownNode(withNull));
    }

    // Untyped nodes
    if (flags.preserveUnknownFields) {
      return this.register(keys, unknownNode(withNull));
    }
    if (raw.properties !== undefined || raw.additionalProperties !== undefined) {
      return this.parseObject(raw, path, depth, keys, withNull);
    }
    if (raw.items !== undefined) {
      return this.parseArray(raw, path, depth, keys, withNull);
    }
    this.report(new UnsupportedSchemaConstructError("schema node has no type", path));
    return this.register(keys, unknownNode(withNull));
  }

  // ---------------------------------------------------------------------------
  // Node kinds
  // ---------------------------------------------------------------------------

  private parseObject(
    raw: RawSchema,
    path: readonly string[],
    depth: number,
    keys: object[],
    flags: FlagInput
  ): SchemaNode {
    const declared = isRecord(raw.properties) ? raw.properties : {};
    const additional = raw.additionalProperties;
    const hasProperties = Object.keys(declared).length > 0;
    const hasAdditional = isRecord(additional) || additional === true;

    if (hasProperties && hasAdditional) {
      this.report(
        new UnsupportedSchemaConstructError("object declares both properties and additionalProperties", path)
      );
    } else if (hasAdditional) {
      const node: Draft<MapNode> = { ...DEFAULT_FLAGS, ...flags, kind: "map", value: unknownNode() };
      this.register(keys, node);
      if (additional !== true) {
        node.value = this.parseNode(additional, [...path, "additionalProperties"], depth + 1);
      }
      return node;
    }

    if (!hasProperties && (flags.preserveUnknownFields || flags.embeddedResource)) {
      return this.register(keys, unknownNode(flags));
    }

    const properties = new Map<string, SchemaNode>();
    const required = new Set<string>();
    const node: ObjectNode = { ...DEFAULT_FLAGS, ...flags, kind: "object", properties, required };
    this.register(keys, node);

    for (const key of orderedKeys(declared)) {
      properties.set(key, this.parseNode(declared[key], [...path, key], depth + 1));
    }
    for (const name of readStrings(raw.required)) {
      if (properties.has(name)) {
        required.add(name);
      } else {
        logger.debug({ path: path.join("."), name }, "Dropping required name with no property");
      }
    }
    return node;
  }

  private parseArray(
    raw: RawSchema,
    path: readonly string[],
    depth: number,
    keys: object[],
    flags: FlagInput
  ): SchemaNode {
    const node: Draft<ArrayNode> = {
      ...DEFAULT_FLAGS,
      ...flags,
      kind: "array",
      items: unknownNode(),
      listType: readListType(raw),
    };
    this.register(keys, node);

    const items = raw.items;
    if (Array.isArray(items)) {
      this.report(new UnsupportedSchemaConstructError("tuple items are not supported", path));
    } else if (items === undefined) {
      this.report(new UnsupportedSchemaConstructError("array has no items schema", path));
    } else {
      node.items = this.parseNode(items, [...path, "items"], depth + 1);
    }
    return node;
  }

  private parseEnumeration(
    raw: RawSchema,
    declaredType: string | undefined,
    path: readonly string[],
    flags: FlagInput
  ): SchemaNode {
    const values: unknown[] = Array.isArray(raw.enum) ? raw.enum : [raw.const];
    let nullable = flags.nullable ?? false;
    const literals: Literal[] = [];

    for (const value of values) {
      if (value === null) {
        nullable = true;
      } else if (isLiteral(value)) {
        literals.push(value);
      } else {
        this.report(
          new UnsupportedSchemaConstructError(`enum value ${stableStringify(value)} is not a scalar literal`, path)
        );
      }
    }

    const scalar = isScalarKind(declaredType) ? declaredType : inferScalar(literals[0]);
    if (literals.length === 0) {
      return scalarNode(scalar, { ...flags, nullable });
    }
    return enumerationNode(literals, scalar, { ...flags, nullable });
  }

  private parseUnion(
    raw: RawSchema,
    combinator: UnionNode["combinator"],
    branches: unknown[],
    path: readonly string[],
    depth: number,
    keys: object[],
    flags: FlagInput
  ): SchemaNode {
    const variants: SchemaNode[] = [];
    const node: Draft<UnionNode> = { ...DEFAULT_FLAGS, ...flags, kind: "union", combinator, variants };
    this.register(keys, node);

    const inheritedType = typeof raw.type === "string" ? raw.type : undefined;
    branches.forEach((branch, index) => {
      const branchPath = [...path, `${combinator}[${index}]`];
      const resolved = isRecord(branch) ? this.deref(branch, branchPath) : undefined;
      if (resolved && isNullBranch(resolved)) {
        node.nullable = true;
        return;
      }
      if (resolved && !hasShape(resolved)) {
        return;
      }
      variants.push(this.parseNode(branch, branchPath, depth + 1, inheritedType));
    });
    return node;
  }

  /**
   * `type: [string, integer]` and friends: a union over the listed scalars.
   */
  private parseTypeList(
    raw: RawSchema,
    types: string[],
    path: readonly string[],
    depth: number,
    keys: object[],
    flags: FlagInput
  ): SchemaNode {
    const scalars = types.filter(isScalarKind);
    if (scalars.length !== types.length) {
      this.report(new UnsupportedSchemaConstructError(`unsupported type list [${types.join(", ")}]`, path));
      return this.register(keys, unknownNode(flags));
    }
    const format = typeof raw.format === "string" ? raw.format : undefined;
    const variants = scalars.map((scalar) => scalarNode(scalar, { format }));
    const node: UnionNode = { ...DEFAULT_FLAGS, ...flags, kind: "union", combinator: "anyOf", variants };
    logger.debug({ path: path.join("."), depth, types }, "Type list parsed as union");
    return this.register(keys, node);
  }

  private parseAllOf(
    raw: RawSchema,
    branches: unknown[],
    path: readonly string[],
    depth: number,
    keys: object[]
  ): SchemaNode {
    let merged: RawSchema = Object.fromEntries(Object.entries(raw).filter(([key]) => key !== "allOf"));
    branches.forEach((branch, index) => {
      const branchPath = [...path, `allOf[${index}]`];
      if (!isRecord(branch)) {
        this.report(new UnsupportedSchemaConstructError("allOf branch is not an object", branchPath));
        return;
      }
      const resolved = this.deref(branch, branchPath);
      if (resolved) {
        merged = this.merge(merged, resolved, path);
      }
    });
    return this.parseRecord(merged, path, depth, keys);
  }

  // ---------------------------------------------------------------------------
  // allOf merging
  // ---------------------------------------------------------------------------

  private merge(left: RawSchema, right: RawSchema, path: readonly string[]): RawSchema {
    const result: RawSchema = { ...left };
    for (const [key, value] of Object.entries(right)) {
      const existing = result[key];
      if (existing === undefined) {
        result[key] = value;
        continue;
      }
      if (key === "properties" && isRecord(existing) && isRecord(value)) {
        result[key] = this.mergeProperties(existing, value, path);
      } else if (key === "required") {
        result[key] = [...new Set([...readStrings(existing), ...readStrings(value)])];
      } else if (key === "allOf" && Array.isArray(existing) && Array.isArray(value)) {
        result[key] = [...existing, ...value];
      } else if (key === "type" && stableStringify(existing) !== stableStringify(value)) {
        this.report(
          new UnsupportedSchemaConstructError(
            `allOf branches disagree on type (${stableStringify(existing)} vs ${stableStringify(value)})`,
            path
          )
        );
      }
    }
    return result;
  }

  private mergeProperties(left: RawSchema, right: RawSchema, path: readonly string[]): RawSchema {
    const result: RawSchema = { ...left };
    for (const [name, schema] of Object.entries(right)) {
      const existing = result[name];
      if (existing === undefined || existing === schema) {
        result[name] = schema;
      } else if (isRecord(existing) && isRecord(schema)) {
        result[name] = this.merge(existing, schema, [...path, name]);
      } else if (stableStringify(existing) !== stableStringify(schema)) {
        this.report(new UnsupportedSchemaConstructError(`conflicting allOf definitions for property "${name}"`, path));
      }
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // References
  // ---------------------------------------------------------------------------

  /**
   * Follow `$ref` chains to the schema they name. Returns undefined (after
   * reporting) when a reference cannot be resolved.
   */
  private deref(raw: RawSchema, path: readonly string[]): RawSchema | undefined {
    let current = raw;
    const seen = new Set<string>();
    while (typeof current.$ref === "string") {
      const ref = current.$ref;
      if (seen.has(ref)) {
        this.report(new UnsupportedSchemaConstructError(`circular $ref "${ref}"`, path));
        return undefined;
      }
      seen.add(ref);
      const target = this.resolvePointer(ref);
      if (!isRecord(target)) {
        this.report(new UnsupportedSchemaConstructError(`unresolvable $ref "${ref}"`, path));
        return undefined;
      }
      current = target;
    }
    return current;
  }

  private resolvePointer(ref: string): unknown {
    if (ref === "#") return this.document;
    if (!ref.startsWith("#/")) return undefined;

    let current: unknown = this.document;
    for (const segment of ref.slice(2).split("/").map(unescapePointerSegment)) {
      if (Array.isArray(current) && /^\d+$/.test(segment)) {
        current = current[Number(segment)];
      } else if (isRecord(current)) {
        current = current[segment];
      } else {
        return undefined;
      }
    }
    return current;
  }

  // ---------------------------------------------------------------------------
  // Bookkeeping
  // ---------------------------------------------------------------------------

  private register<N extends SchemaNode>(keys: object[], node: N): N {
    for (const key of keys) {
      this.memo.set(key, node);
    }
    return node;
  }

  /**
   * Throw, or in relaxed mode record a diagnostic and let the caller fall
   * back to a placeholder.
   */
  private report(error: AnalysisError): void {
    if (!this.relaxed) {
      throw error;
    }
    logger.debug({ path: error.path.join("."), reason: error.message }, "Relaxed: unsupported construct");
    this.diagnostics.push(toDiagnostic(error));
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse a decoded schema document into the Schema Model.
 *
 * @example
 * ```typescript
 * const parsed = parseSchema(yaml.load(text), { path: ["Agent"] });
 * if (parsed.ok) build(parsed.value.root, { kind: "Agent" });
 * ```
 */
export function parseSchema(raw: unknown, options: ParseOptions = {}): Result<ParsedSchema, AnalysisError> {
  const parser = new SchemaParser(
    options.document ?? raw,
    options.relaxed ?? false,
    options.maxDepth ?? DEFAULT_MAX_DEPTH
  );
  return tryCatch(() => parser.parse(raw, options.path ?? []), isAnalysisError);
}
