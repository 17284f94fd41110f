/**
 * Derivation & Annotation Resolver
 *
 * Decorates every generated type with the requested capabilities it can
 * support, records why the others were withheld, assigns builder policies
 * to fields and applies the elide and docs settings.
 *
 * Whether a type can have a default value, or reaches a schema-less value,
 * depends on the types it references. Both are computed once for the whole
 * graph as fixed points, so the answer for a type does not depend on the
 * order in which types are visited, and cycles settle consistently.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { referencesOf, type TypeGraph } from "../type-graph/type-graph.js";
import {
  innermostRef,
  type BuilderPolicy,
  type Capability,
  type Field,
  type GeneratedType,
  type SchemaMode,
  type TypeRef,
  type WithheldCapability,
} from "../type-graph/types.js";
import { KNOWN_SHAPE_TYPES } from "../known-shapes/interfaces.js";
import { appliesTo, canonicalCapabilities, type CapabilityRequest } from "./capabilities.js";

const logger = createLogger("derivation");

/** Known shapes whose external type has no default value */
const EXTERNALS_WITHOUT_DEFAULT: ReadonlySet<string> = new Set([KNOWN_SHAPE_TYPES["int-or-string"]]);

export interface ResolveOptions {
  requests?: readonly CapabilityRequest[];

  /** Request `builder` for every composite */
  enableBuilders?: boolean;

  /** `derived` requests `reflection` for every type */
  schemaMode?: SchemaMode;

  /** Type names to flag as elided */
  elide?: readonly string[];

  /** Keep descriptions; when false they are stripped */
  enableDocs?: boolean;
}

interface GraphFacts {
  /** Types without a default value, with the reason */
  withoutDefault: ReadonlyMap<string, string>;
  /** Types that reach a schema-less value, with the route */
  reachesUnknown: ReadonlyMap<string, string>;
}

function builderPolicy(field: Field): BuilderPolicy {
  if (field.optional) return "default-strip-optional";
  if (field.absence === "empty") return "default";
  return "required";
}

export class DerivationResolver {
  constructor(private readonly options: ResolveOptions = {}) {}

  /**
   * Decorate the graph in place. The graph must not be frozen yet.
   */
  resolve(graph: TypeGraph): TypeGraph {
    this.warnAboutUnknownNames(graph);

    const facts: GraphFacts = {
      withoutDefault: this.findTypesWithoutDefault(graph),
      reachesUnknown: this.findTypesReachingUnknown(graph),
    };

    let granted = 0;
    let withheld = 0;
    for (const type of [...graph.types]) {
      const decorated = this.decorate(type, facts);
      granted += decorated.capabilities.length;
      withheld += decorated.withheld.length;
      graph.replace(decorated);
    }

    logger.debug({ types: graph.size, granted, withheld }, "Resolved capabilities");
    return graph;
  }

  // ===========================================================================
  // Per-type Decoration
  // ===========================================================================

  private decorate(type: GeneratedType, facts: GraphFacts): GeneratedType {
    const capabilities: Capability[] = [];
    const withheld: WithheldCapability[] = [];
    for (const capability of this.requestedFor(type)) {
      const reason = this.withholdReason(capability, type, facts);
      if (reason === undefined) {
        capabilities.push(capability);
      } else {
        withheld.push({ capability, reason });
      }
    }

    const elided = (this.options.elide ?? []).includes(type.name);
    const docs = this.options.enableDocs ?? false;
    const description = docs ? type.description : undefined;

    switch (type.kind) {
      case "composite": {
        const builders = capabilities.includes("builder");
        const fields = type.fields.map((field) => ({
          ...field,
          description: docs ? field.description : undefined,
          builder: builders ? builderPolicy(field) : undefined,
        }));
        return { ...type, description, capabilities, withheld, elided, fields };
      }
      case "enumerated":
        if (type.shape === "unit") {
          return { ...type, description, capabilities, withheld, elided };
        }
        return {
          ...type,
          description,
          capabilities,
          withheld,
          elided,
          variants: type.variants.map((variant) => ({
            ...variant,
            description: docs ? variant.description : undefined,
          })),
        };
    }
  }

  private requestedFor(type: GeneratedType): Capability[] {
    const requested: Capability[] = [];
    for (const request of this.options.requests ?? []) {
      if (appliesTo(request.target, type)) {
        requested.push(request.capability);
      }
    }
    if (this.options.enableBuilders && type.kind === "composite") {
      requested.push("builder");
    }
    if (this.options.schemaMode === "derived") {
      requested.push("reflection");
    }
    return canonicalCapabilities(requested);
  }

  private withholdReason(capability: Capability, type: GeneratedType, facts: GraphFacts): string | undefined {
    switch (capability) {
      case "equality":
      case "reflection":
        return undefined;
      case "ordering":
        return facts.reachesUnknown.get(type.name);
      case "default":
        return facts.withoutDefault.get(type.name);
      case "builder":
        return type.kind === "enumerated" ? "builders apply to composite types only" : undefined;
    }
  }

  // ===========================================================================
  // Graph-wide Facts
  // ===========================================================================

  /**
   * Greatest fixed point: every composite starts out with a default, and
   * loses it once a required field without a schema default has a type
   * that lacks one.
   */
  private findTypesWithoutDefault(graph: TypeGraph): Map<string, string> {
    const lacking = new Set<string>();
    for (const type of graph.types) {
      if (type.kind === "enumerated") lacking.add(type.name);
    }

    let changed = true;
    while (changed) {
      changed = false;
      for (const type of graph.types) {
        if (type.kind !== "composite" || lacking.has(type.name)) continue;
        if (type.fields.some((field) => this.fieldLacksDefault(field, lacking, graph) !== undefined)) {
          lacking.add(type.name);
          changed = true;
        }
      }
    }

    const reasons = new Map<string, string>();
    for (const type of graph.types) {
      if (!lacking.has(type.name)) continue;
      if (type.kind === "enumerated") {
        reasons.set(type.name, "enumerated types have no default value");
        continue;
      }
      for (const field of type.fields) {
        const reason = this.fieldLacksDefault(field, lacking, graph);
        if (reason !== undefined) {
          reasons.set(type.name, `required field ${field.name} ${reason}`);
          break;
        }
      }
    }
    return reasons;
  }

  private fieldLacksDefault(field: Field, lacking: ReadonlySet<string>, graph: TypeGraph): string | undefined {
    if (field.optional || field.defaultValue !== undefined) {
      return undefined;
    }
    return this.refLacksDefault(field.type, lacking, graph);
  }

  private refLacksDefault(ref: TypeRef, lacking: ReadonlySet<string>, graph: TypeGraph): string | undefined {
    switch (ref.kind) {
      case "optional":
      case "sequence":
      case "map":
      case "unknown":
        return undefined;
      case "primitive":
        return ref.primitive === "date" || ref.primitive === "date-time"
          ? `is a ${ref.primitive} without a default value`
          : undefined;
      case "external":
        if (ref.origin === "override") return `has the override type ${ref.name}`;
        return EXTERNALS_WITHOUT_DEFAULT.has(ref.name) ? `is a ${ref.name}` : undefined;
      case "ref": {
        const target = graph.get(ref.target);
        if (target?.kind === "enumerated") return `is the enumerated type ${ref.target}`;
        return lacking.has(ref.target) ? `is ${ref.target}, which has no default value` : undefined;
      }
    }
  }

  /**
   * Least fixed point: a type reaches a schema-less value when one of its
   * references is `unknown` or a type that reaches one.
   */
  private findTypesReachingUnknown(graph: TypeGraph): Map<string, string> {
    const reaching = new Set<string>();
    let changed = true;
    while (changed) {
      changed = false;
      for (const type of graph.types) {
        if (reaching.has(type.name)) continue;
        if (referencesOf(type).some((ref) => this.reachesUnknown(ref, reaching))) {
          reaching.add(type.name);
          changed = true;
        }
      }
    }

    const routes = new Map<string, string>();
    for (const type of graph.types) {
      if (!reaching.has(type.name)) continue;
      const members: ReadonlyArray<{ name: string; type: TypeRef }> =
        type.kind === "composite" ? type.fields : type.shape === "tagged" ? type.variants : [];
      const member = members.find((candidate) => this.reachesUnknown(candidate.type, reaching));
      if (!member) continue;
      const inner = innermostRef(member.type);
      routes.set(
        type.name,
        inner.kind === "ref"
          ? `${member.name} reaches a schema-less value through ${inner.target}`
          : `${member.name} holds a schema-less value`
      );
    }
    return routes;
  }

  private reachesUnknown(ref: TypeRef, reaching: ReadonlySet<string>): boolean {
    const inner = innermostRef(ref);
    return inner.kind === "unknown" || (inner.kind === "ref" && reaching.has(inner.target));
  }

  private warnAboutUnknownNames(graph: TypeGraph): void {
    for (const request of this.options.requests ?? []) {
      if (request.target.scope === "type" && !graph.has(request.target.name)) {
        logger.warn(
          { type: request.target.name, capability: request.capability },
          "Capability requested for a type that does not exist"
        );
      }
    }
    for (const name of this.options.elide ?? []) {
      if (!graph.has(name)) {
        logger.warn({ type: name }, "Elided type does not exist");
      }
    }
  }
}

/**
 * Resolve capabilities, builder policies, elision and docs for a graph.
 */
export function resolveDerivations(graph: TypeGraph, options: ResolveOptions = {}): TypeGraph {
  return new DerivationResolver(options).resolve(graph);
}
