/**
 * Type Graph
 *
 * Name-addressed collection of generated types in pre-order from the root.
 * Populated by one builder run, decorated by the resolver, then frozen and
 * handed to an emitter.
 *
 * @module
 */

import type { Diagnostic } from "../errors.js";
import {
  innermostRef,
  type Field,
  type GeneratedType,
  type TaggedVariant,
  type TypeGraphMetadata,
  type TypeRef,
} from "./types.js";

export interface TypeGraphJSON {
  metadata: TypeGraphMetadata;
  types: GeneratedType[];
  diagnostics: Diagnostic[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Every reference a type makes, in field or variant order.
 */
export function referencesOf(type: GeneratedType): TypeRef[] {
  if (type.kind === "composite") {
    return type.fields.map((field: Field) => field.type);
  }
  if (type.shape === "tagged") {
    return type.variants.map((variant: TaggedVariant) => variant.type);
  }
  return [];
}

export class TypeGraph {
  private readonly byName = new Map<string, GeneratedType>();
  private readonly ordered: GeneratedType[] = [];
  private readonly diagnosticList: Diagnostic[] = [];
  private frozen = false;

  constructor(public readonly metadata: TypeGraphMetadata) {}

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Types in pre-order; the root comes first */
  get types(): readonly GeneratedType[] {
    return this.ordered;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.diagnosticList;
  }

  get root(): GeneratedType | undefined {
    return this.ordered[0];
  }

  get size(): number {
    return this.ordered.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): GeneratedType | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * The generated type a reference ultimately points at, looking through
   * sequence, map and optional wrappers.
   */
  resolve(ref: TypeRef): GeneratedType | undefined {
    const inner = innermostRef(ref);
    return inner.kind === "ref" ? this.byName.get(inner.target) : undefined;
  }

  /**
   * Names referenced by some type but absent from the graph. Empty for any
   * graph the builder produced.
   */
  unresolvedReferences(): string[] {
    const missing = new Set<string>();
    for (const type of this.ordered) {
      for (const ref of referencesOf(type)) {
        const inner = innermostRef(ref);
        if (inner.kind === "ref" && !this.byName.has(inner.target)) {
          missing.add(inner.target);
        }
      }
    }
    return [...missing];
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  add(type: GeneratedType): void {
    this.assertMutable();
    if (this.byName.has(type.name)) {
      throw new Error(`Type graph already contains a type named ${type.name}`);
    }
    this.byName.set(type.name, type);
    this.ordered.push(type);
  }

  /**
   * Swap in a new version of an existing type, keeping its position.
   */
  replace(type: GeneratedType): void {
    this.assertMutable();
    const index = this.ordered.findIndex((existing) => existing.name === type.name);
    if (index === -1) {
      throw new Error(`Type graph has no type named ${type.name}`);
    }
    this.ordered[index] = type;
    this.byName.set(type.name, type);
  }

  addDiagnostic(diagnostic: Diagnostic): void {
    this.assertMutable();
    this.diagnosticList.push(diagnostic);
  }

  /**
   * Make the graph and everything in it immutable.
   */
  freeze(): this {
    if (!this.frozen) {
      this.frozen = true;
      deepFreeze(this.metadata);
      deepFreeze(this.ordered);
      deepFreeze(this.diagnosticList);
    }
    return this;
  }

  toJSON(): TypeGraphJSON {
    return {
      metadata: this.metadata,
      types: [...this.ordered],
      diagnostics: [...this.diagnosticList],
    };
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new Error("Type graph is frozen");
    }
  }
}
