/**
 * Type Graph Builder
 *
 * Walks a Schema Model depth-first and produces the Type Graph:
 * - objects with properties become composite types named from their path
 * - enumerations and literal unions become unit enumerated types
 * - unions of differently shaped variants become tagged enumerated types
 * - known shapes and property overrides are referenced, not synthesized
 *
 * Types live in an arena while the walk is in progress, and references
 * point at arena slots. A slot is reserved in pre-order, so a node met again
 * while it is still on the recursion stack resolves to an indirect
 * reference to its own slot. When a slot completes (post-order) its
 * structural key is compared against the types built so far; an identical
 * type absorbs it. Only then is a name assigned.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { tryCatch, type Result } from "../../types/result.js";
import {
  AnalysisError,
  CycleDepthExceededError,
  IrreconcilableUnionError,
  NamingCollisionError,
  UnsupportedSchemaConstructError,
  formatPath,
  isAnalysisError,
  toDiagnostic,
  type Diagnostic,
} from "../errors.js";
import type {
  ArrayNode,
  EnumerationNode,
  MapNode,
  ObjectNode,
  ScalarNode,
  SchemaNode,
  UnionNode,
} from "../schema/model.js";
import { createKnownShapeService } from "../known-shapes/service.js";
import type { IKnownShapeService } from "../known-shapes/interfaces.js";
import { PropertyOverrides } from "../overrides/property-overrides.js";
import { TypeGraph } from "../type-graph/type-graph.js";
import { enumVariantName, pascalCase } from "../type-graph/naming.js";
import {
  UNKNOWN_REF,
  describeRef,
  externalRef,
  innermostRef,
  mapOf,
  mapRefTargets,
  optionalOf,
  primitiveRef,
  sequenceOf,
  type Field,
  type GeneratedType,
  type TaggedVariant,
  type TypeRef,
  type UnitVariant,
} from "../type-graph/types.js";
import type { NamingStrategy } from "../../utils/validation.js";
import { DEFAULT_BUILD_OPTIONS, type BuildOptions } from "./interfaces.js";
import { structuralKey } from "./structural-hash.js";

const logger = createLogger("graph-builder");

// =============================================================================
// Arena
// =============================================================================

type SlotState = "pending" | "done" | "alias" | "discarded";

interface Slot {
  id: number;
  path: readonly string[];
  level: number;
  state: SlotState;
  selfReferential: boolean;
  aliasOf?: number;
  type?: GeneratedType<number>;
}

type Ref = TypeRef<number>;

interface VisitContext {
  /** PascalCase path segments; names any type created here */
  path: readonly string[];
  /** Level of a type created here */
  level: number;
  depth: number;
  /** Inside a sequence or map, which already adds indirection */
  inContainer: boolean;
  /** Directly inside a sequence's items */
  inSequence: boolean;
  /** Property holding the node, if any */
  propertyName?: string;
  /** Level of the composite that owns the property */
  ownerLevel: number;
}

function scalarRef(node: ScalarNode): Ref {
  const format = node.format;
  switch (node.scalar) {
    case "string":
      if (format === "date" || format === "date-time") return primitiveRef(format);
      return primitiveRef("string", format);
    case "integer":
      return primitiveRef("integer", format ?? "int64");
    case "number":
      return primitiveRef("number", format ?? "double");
    case "boolean":
      return primitiveRef("boolean");
  }
}

function pathSegment(name: string): string {
  return pascalCase(name) || "Property";
}

// =============================================================================
// Builder
// =============================================================================

/**
 * One builder per analysis: naming state, the arena and the dedup index are
 * all scoped to the instance.
 */
export class TypeGraphBuilder {
  private readonly slots: Slot[] = [];
  /** Nodes on the recursion stack, mapped to their reserved slot */
  private readonly stack = new Map<SchemaNode, number>();
  /** Array and map nodes on the recursion stack; they have no slot of their own */
  private readonly containers = new Set<SchemaNode>();
  /** Nodes already built, mapped to the reference they produced */
  private readonly built = new Map<SchemaNode, Ref>();
  private readonly byKey = new Map<string, number>();
  private readonly names = new Map<string, number>();
  private readonly diagnostics: Diagnostic[];

  private readonly naming: NamingStrategy;
  private readonly maxDepth: number;
  private readonly relaxed: boolean;
  private readonly enableDocs: boolean;
  private readonly knownShapes: IKnownShapeService;
  private readonly overrides: PropertyOverrides;

  constructor(private readonly options: BuildOptions) {
    this.naming = options.naming ?? DEFAULT_BUILD_OPTIONS.naming;
    this.maxDepth = options.maxDepth ?? DEFAULT_BUILD_OPTIONS.maxDepth;
    this.relaxed = options.relaxed ?? DEFAULT_BUILD_OPTIONS.relaxed;
    this.enableDocs = options.enableDocs ?? DEFAULT_BUILD_OPTIONS.enableDocs;
    this.knownShapes = options.knownShapes ?? createKnownShapeService();
    this.overrides = options.overrides ?? PropertyOverrides.empty();
    this.diagnostics = [...(options.diagnostics ?? [])];
  }

  /**
   * Build the graph for a root object schema.
   *
   * @throws {AnalysisError} When the schema cannot be represented
   */
  build(root: SchemaNode): TypeGraph {
    const { kind } = this.options;
    if (root.kind !== "object") {
      throw new UnsupportedSchemaConstructError(`root schema must be an object, got ${root.kind}`, [kind]);
    }

    logger.debug({ kind, naming: this.naming, relaxed: this.relaxed }, "Building type graph");
    // The root keeps the kind as its name whatever its descendants are called
    this.names.set(kind, 0);
    this.visitObject(
      root,
      { path: [kind], level: 0, depth: 0, inContainer: false, inSequence: false, ownerLevel: -1 },
      true
    );
    return this.finalize();
  }

  // ===========================================================================
  // Visiting
  // ===========================================================================

  private visit(node: SchemaNode, ctx: VisitContext): Ref {
    if (ctx.depth > this.maxDepth) {
      throw new CycleDepthExceededError(ctx.path, this.maxDepth);
    }

    const shape = this.knownShapes.detect({ node, propertyName: ctx.propertyName, level: ctx.ownerLevel });
    if (shape) {
      return shape.ref;
    }

    switch (node.kind) {
      case "scalar":
        return scalarRef(node);
      case "unknown":
        return UNKNOWN_REF;
      case "enumeration":
        return this.visitEnumeration(node, ctx);
      case "array":
      case "map":
        return this.visitContainer(node, ctx);
      case "object":
        return this.visitObject(node, ctx, false);
      case "union":
        return this.visitUnion(node, ctx);
    }
  }

  private visitContainer(node: ArrayNode | MapNode, ctx: VisitContext): Ref {
    if (this.containers.has(node)) {
      // A container that holds itself has no named type to point back at
      logger.debug({ path: formatPath(ctx.path) }, "Recursive container resolved to unknown");
      this.diagnostics.push(
        toDiagnostic(new UnsupportedSchemaConstructError("recursive container resolved to unknown", ctx.path))
      );
      return UNKNOWN_REF;
    }

    this.containers.add(node);
    try {
      if (node.kind === "array") {
        const path = ctx.inSequence ? [...ctx.path, "Items"] : ctx.path;
        return sequenceOf(
          this.visit(node.items, {
            ...ctx,
            path,
            depth: ctx.depth + 1,
            inContainer: true,
            inSequence: true,
            propertyName: undefined,
          }),
          node.listType
        );
      }
      return mapOf(
        this.visit(node.value, {
          ...ctx,
          depth: ctx.depth + 1,
          inContainer: true,
          inSequence: false,
          propertyName: undefined,
        })
      );
    } finally {
      this.containers.delete(node);
    }
  }

  private visitObject(node: ObjectNode, ctx: VisitContext, isRoot: boolean): Ref {
    if (node.properties.size === 0 && !isRoot) {
      return UNKNOWN_REF;
    }
    const cached = this.lookup(node, ctx);
    if (cached) return cached;

    const id = this.reserve(node, ctx);
    const fields: Field<number>[] = [];
    for (const [name, child] of node.properties) {
      const field = this.buildField(name, child, node.required.has(name), ctx);
      if (field) fields.push(field);
    }
    this.stack.delete(node);

    return this.complete(node, id, {
      ...this.typeBase(ctx, node),
      kind: "composite",
      fields,
    });
  }

  private buildField(
    name: string,
    node: SchemaNode,
    required: boolean,
    owner: VisitContext
  ): Field<number> | undefined {
    let type: Ref;
    const action = this.overrides.match(name, node);
    if (action?.kind === "omit") {
      logger.debug({ path: formatPath(owner.path), property: name }, "Property omitted by override");
      return undefined;
    }
    if (action?.kind === "replace") {
      type = externalRef(action.typeName, "override");
    } else {
      type = this.visit(node, {
        path: [...owner.path, pathSegment(name)],
        level: owner.level + 1,
        depth: owner.depth + 1,
        inContainer: false,
        inSequence: false,
        propertyName: name,
        ownerLevel: owner.level,
      });
    }

    const field: Field<number> = { name, type, optional: false, absence: "required" };
    if (!required || node.nullable) {
      field.optional = true;
      field.absence = "omit";
      field.type = optionalOf(type);
    } else if (type.kind === "sequence" || type.kind === "map") {
      field.absence = "empty";
    }
    if (this.enableDocs && node.description !== undefined) {
      field.description = node.description;
    }
    if (node.defaultValue !== undefined) {
      field.defaultValue = structuredClone(node.defaultValue);
    }
    return field;
  }

  private visitEnumeration(node: EnumerationNode, ctx: VisitContext): Ref {
    const cached = this.lookup(node, ctx);
    if (cached) return cached;

    const id = this.reserve(node, ctx);
    const variants = this.unitVariants([node]);
    this.stack.delete(node);
    return this.complete(node, id, { ...this.typeBase(ctx, node), kind: "enumerated", shape: "unit", variants });
  }

  // ===========================================================================
  // Unions
  // ===========================================================================

  private visitUnion(node: UnionNode, ctx: VisitContext): Ref {
    const variants = node.variants;
    const first = variants[0];
    if (first === undefined) {
      return UNKNOWN_REF;
    }
    if (variants.length === 1) {
      return this.visit(first, ctx);
    }

    const concrete = variants.filter((variant) => variant.kind !== "unknown");
    if (concrete.length === 0) {
      return UNKNOWN_REF;
    }
    if (concrete.length < variants.length) {
      return this.fail(
        new IrreconcilableUnionError("schema-less variant mixed with concrete variants", ctx.path, {
          variants: variants.map((variant) => variant.kind),
        })
      );
    }

    const literals = variants.filter((variant): variant is EnumerationNode => variant.kind === "enumeration");
    if (literals.length === variants.length) {
      return this.visitLiteralUnion(node, literals, ctx);
    }
    const scalars = variants.filter((variant): variant is ScalarNode => variant.kind === "scalar");
    const [open] = scalars;
    // Literals beside an unrestricted scalar of their own kind add nothing
    if (
      literals.length > 0 &&
      open !== undefined &&
      literals.length + scalars.length === variants.length &&
      [...scalars, ...literals].every((variant) => variant.scalar === open.scalar)
    ) {
      return this.visit(open, ctx);
    }
    if (literals.length > 0) {
      return this.fail(
        new UnsupportedSchemaConstructError("union mixes literal values with structured variants", ctx.path, {
          variants: variants.map((variant) => variant.kind),
        })
      );
    }

    if (scalars.length === variants.length && scalars.every((variant) => variant.scalar === scalars[0]?.scalar)) {
      return this.visit(first, ctx);
    }
    return this.visitTaggedUnion(node, ctx);
  }

  private visitLiteralUnion(node: UnionNode, literals: EnumerationNode[], ctx: VisitContext): Ref {
    const cached = this.lookup(node, ctx);
    if (cached) return cached;

    const id = this.reserve(node, ctx);
    const variants = this.unitVariants(literals);
    this.stack.delete(node);
    return this.complete(node, id, { ...this.typeBase(ctx, node), kind: "enumerated", shape: "unit", variants });
  }

  private visitTaggedUnion(node: UnionNode, ctx: VisitContext): Ref {
    const cached = this.lookup(node, ctx);
    if (cached) return cached;

    const id = this.reserve(node, ctx);
    const taken = new Set<string>();
    const seen = new Set<string>();
    const variants: TaggedVariant<number>[] = [];

    node.variants.forEach((variant, index) => {
      const name = this.variantName(variant, index, taken);
      const type = this.visit(variant, {
        path: [...ctx.path, name],
        level: ctx.level + 1,
        depth: ctx.depth + 1,
        inContainer: false,
        inSequence: false,
        ownerLevel: ctx.level,
      });
      // Branches that build to the same type collapse
      const key = describeRef(mapRefTargets(type, (target, indirect) => ({ kind: "ref", target: this.canonical(target), indirect })));
      if (seen.has(key)) return;
      seen.add(key);
      const entry: TaggedVariant<number> = { name, type };
      if (this.enableDocs && variant.description !== undefined) {
        entry.description = variant.description;
      }
      variants.push(entry);
    });
    this.stack.delete(node);

    const slot = this.slot(id);
    const only = variants[0];
    if (variants.length === 1 && only !== undefined && !slot.selfReferential) {
      slot.state = "discarded";
      logger.debug({ path: formatPath(ctx.path) }, "Union variants collapsed into one");
      this.built.set(node, only.type);
      return only.type;
    }
    return this.complete(node, id, { ...this.typeBase(ctx, node), kind: "enumerated", shape: "tagged", variants });
  }

  private unitVariants(nodes: readonly EnumerationNode[]): UnitVariant[] {
    const taken = new Set<string>();
    const seen = new Set<string>();
    const variants: UnitVariant[] = [];
    for (const node of nodes) {
      for (const literal of node.literals) {
        const key = `${typeof literal}:${String(literal)}`;
        if (seen.has(key)) continue;
        seen.add(key);
        variants.push({ name: enumVariantName(literal, taken), literal });
      }
    }
    return variants;
  }

  /**
   * Variant name: the branch title, else its single required or declared
   * property, else its scalar kind, else its position.
   */
  private variantName(variant: SchemaNode, index: number, taken: Set<string>): string {
    let name = variant.title ? pascalCase(variant.title) : "";
    if (!name && variant.kind === "object") {
      const [onlyRequired] = variant.required;
      const [onlyDeclared] = variant.properties.keys();
      if (variant.required.size === 1 && onlyRequired !== undefined) {
        name = pascalCase(onlyRequired);
      } else if (variant.properties.size === 1 && onlyDeclared !== undefined) {
        name = pascalCase(onlyDeclared);
      }
    }
    if (!name && variant.kind === "scalar") {
      name = pascalCase(variant.scalar);
    }
    if (!name || !/^[A-Za-z]/.test(name) || taken.has(name)) {
      name = `Variant${index + 1}`;
    }
    taken.add(name);
    return name;
  }

  // ===========================================================================
  // Arena Management
  // ===========================================================================

  /**
   * A reference for a node that is on the recursion stack or already built.
   */
  private lookup(node: SchemaNode, ctx: VisitContext): Ref | undefined {
    const pending = this.stack.get(node);
    if (pending !== undefined) {
      const slot = this.slot(pending);
      slot.selfReferential = true;
      logger.debug({ path: formatPath(ctx.path), target: formatPath(slot.path) }, "Cycle detected");
      return { kind: "ref", target: pending, indirect: !ctx.inContainer };
    }
    return this.built.get(node);
  }

  private reserve(node: SchemaNode, ctx: VisitContext): number {
    const id = this.slots.length;
    this.slots.push({ id, path: ctx.path, level: ctx.level, state: "pending", selfReferential: false });
    this.stack.set(node, id);
    return id;
  }

  private slot(id: number): Slot {
    const slot = this.slots[id];
    if (!slot) {
      throw new Error(`No arena slot ${id}`);
    }
    return slot;
  }

  private canonical(id: number): number {
    let slot = this.slot(id);
    while (slot.state === "alias" && slot.aliasOf !== undefined) {
      slot = this.slot(slot.aliasOf);
    }
    return slot.id;
  }

  private typeBase(ctx: VisitContext, node: SchemaNode) {
    return {
      name: "",
      path: ctx.path,
      level: ctx.level,
      description: this.enableDocs ? node.description : undefined,
      selfReferential: false,
      capabilities: [],
      withheld: [],
      elided: false,
    };
  }

  /**
   * Finish a slot: fold it into an identical existing type, or name it.
   */
  private complete(node: SchemaNode, id: number, type: GeneratedType<number>): Ref {
    const slot = this.slot(id);
    const key = structuralKey(type, (target) => this.canonical(target));
    const dedupable = !slot.selfReferential && !this.refersToPending(type);

    const existing = dedupable ? this.byKey.get(key) : undefined;
    if (existing !== undefined) {
      slot.state = "alias";
      slot.aliasOf = existing;
      logger.debug(
        { path: formatPath(slot.path), into: formatPath(this.slot(existing).path) },
        "Deduplicated structurally identical type"
      );
      const ref: Ref = { kind: "ref", target: existing, indirect: false };
      this.built.set(node, ref);
      return ref;
    }

    const name = this.assignName(slot);
    slot.type = { ...type, name };
    slot.state = "done";
    if (dedupable) {
      this.byKey.set(key, id);
    }
    const ref: Ref = { kind: "ref", target: id, indirect: false };
    this.built.set(node, ref);
    return ref;
  }

  private refersToPending(type: GeneratedType<number>): boolean {
    const refs =
      type.kind === "composite"
        ? type.fields.map((field) => field.type)
        : type.shape === "tagged"
          ? type.variants.map((variant) => variant.type)
          : [];
    return refs.some((ref) => {
      const inner = innermostRef(ref);
      return inner.kind === "ref" && this.slot(this.canonical(inner.target)).state === "pending";
    });
  }

  /**
   * Name from the path. `qualified` uses every segment; `shortest` starts
   * from the last segment and widens one enclosing segment per collision.
   */
  private assignName(slot: Slot): string {
    const { path } = slot;
    const widths =
      this.naming === "qualified" ? [path.length] : Array.from({ length: path.length }, (_, index) => index + 1);

    let candidate = "";
    for (const width of widths) {
      candidate = path.slice(path.length - width).join("");
      const holder = this.names.get(candidate);
      if (holder === undefined || holder === slot.id) {
        this.names.set(candidate, slot.id);
        return candidate;
      }
      logger.debug({ candidate, path: formatPath(path) }, "Name taken by a different type, widening");
    }

    const holder = this.names.get(candidate);
    const other = holder === undefined ? undefined : this.slot(holder);
    throw new NamingCollisionError(
      `type name ${candidate} is already used by a structurally different type` +
        (other ? ` at ${formatPath(other.path)}` : ""),
      path,
      { candidate }
    );
  }

  /**
   * Throw, or in relaxed mode record a diagnostic and fall back to unknown.
   */
  private fail(error: AnalysisError): Ref {
    if (!this.relaxed) {
      throw error;
    }
    logger.debug({ path: formatPath(error.path), reason: error.message }, "Relaxed: falling back to unknown");
    this.diagnostics.push(toDiagnostic(error));
    return UNKNOWN_REF;
  }

  // ===========================================================================
  // Finalization
  // ===========================================================================

  private finalize(): TypeGraph {
    const { kind, version = "", mapRepresentation, schemaMode, enableDocs } = this.options;
    const graph = new TypeGraph({
      kind,
      version,
      mapRepresentation: mapRepresentation ?? DEFAULT_BUILD_OPTIONS.mapRepresentation,
      schemaMode: schemaMode ?? DEFAULT_BUILD_OPTIONS.schemaMode,
      docs: enableDocs ?? DEFAULT_BUILD_OPTIONS.enableDocs,
    });

    const nameOf = (target: number, indirect: boolean): TypeRef => {
      const resolved = this.slot(this.canonical(target));
      if (resolved.state !== "done" || !resolved.type) {
        throw new Error(`Reference to unfinished arena slot ${resolved.id}`);
      }
      return { kind: "ref", target: resolved.type.name, indirect };
    };

    for (const slot of this.slots) {
      if (slot.state !== "done" || !slot.type) continue;
      graph.add(this.resolveType(slot.type, slot.selfReferential, nameOf));
    }
    for (const diagnostic of this.diagnostics) {
      graph.addDiagnostic(diagnostic);
    }

    logger.debug(
      { kind, types: graph.size, diagnostics: this.diagnostics.length, slots: this.slots.length },
      "Type graph built"
    );
    return graph;
  }

  private resolveType(
    type: GeneratedType<number>,
    selfReferential: boolean,
    nameOf: (target: number, indirect: boolean) => TypeRef
  ): GeneratedType {
    if (type.kind === "composite") {
      return {
        ...type,
        selfReferential,
        fields: type.fields.map((field) => ({ ...field, type: mapRefTargets(field.type, nameOf) })),
      };
    }
    if (type.shape === "tagged") {
      return {
        ...type,
        selfReferential,
        variants: type.variants.map((variant) => ({ ...variant, type: mapRefTargets(variant.type, nameOf) })),
      };
    }
    return { ...type, selfReferential };
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Build a type graph from a root object schema.
 *
 * @example
 * ```typescript
 * const graph = buildTypeGraph(root, { kind: "Agent", naming: "qualified" });
 * if (graph.ok) console.log(graph.value.types.map((type) => type.name));
 * ```
 */
export function buildTypeGraph(root: SchemaNode, options: BuildOptions): Result<TypeGraph, AnalysisError> {
  return tryCatch(() => new TypeGraphBuilder(options).build(root), isAnalysisError);
}
