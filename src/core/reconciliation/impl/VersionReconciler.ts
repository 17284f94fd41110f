/**
 * Version Reconciler Implementation
 *
 * Chooses the operative schema among the versions of a resource
 * definition: a pinned version, the storage version, the best served
 * version, or all of them merged field by field.
 */

import type {
  IVersionReconciler,
  SchemaVersion,
  SelectOptions,
  SelectedSchema,
} from "../interfaces/IReconciliation.js";
import { compareVersions } from "../version.js";
import type {
  ArrayNode,
  EnumerationNode,
  Literal,
  MapNode,
  ObjectNode,
  ScalarNode,
  SchemaFlags,
  SchemaNode,
  UnionNode,
  UnknownNode,
} from "../../schema/model.js";
import {
  AnalysisError,
  ErrorCode,
  IrreconcilableUnionError,
  ReconcileError,
  formatPath,
  isAnalysisError,
} from "../../errors.js";
import { tryCatch, type Result } from "../../../types/result.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("reconciler");

type Draft<T> = { -readonly [K in keyof T]: T[K] };

function isReconcileFailure(error: unknown): error is ReconcileError | AnalysisError {
  return error instanceof ReconcileError || isAnalysisError(error);
}

/**
 * A version whose schema failed to parse can be listed but not used.
 */
function usable(version: SchemaVersion): SchemaVersion {
  if (version.parseError) {
    throw version.parseError;
  }
  return version;
}

// =============================================================================
// Schema Merging
// =============================================================================

function mergeFlags(a: SchemaFlags, b: SchemaFlags): SchemaFlags {
  return {
    nullable: a.nullable || b.nullable,
    intOrString: a.intOrString || b.intOrString,
    preserveUnknownFields: a.preserveUnknownFields || b.preserveUnknownFields,
    embeddedResource: a.embeddedResource || b.embeddedResource,
    description: a.description ?? b.description,
    title: a.title ?? b.title,
    defaultValue: a.defaultValue !== undefined ? a.defaultValue : b.defaultValue,
  };
}

function literalKey(literal: Literal): string {
  return `${typeof literal}:${String(literal)}`;
}

/**
 * Merges two schemas into one that accepts both. `a` is the higher-priority
 * side: its descriptions, defaults and field order win.
 *
 * Pairs of nodes are memoized, and every container node is registered
 * before its children are merged, so recursive schemas merge into a
 * recursive result.
 */
class SchemaMerger {
  private readonly memo = new Map<SchemaNode, Map<SchemaNode, SchemaNode>>();

  merge(a: SchemaNode, b: SchemaNode, path: readonly string[]): SchemaNode {
    if (a === b) {
      return a;
    }
    const known = this.memo.get(a)?.get(b);
    if (known) {
      return known;
    }

    const flags = mergeFlags(a, b);
    if (a.kind === "unknown" && b.kind === "unknown") {
      const node: UnknownNode = { ...flags, kind: "unknown" };
      return this.remember(a, b, node);
    }
    if (a.kind === "object" && b.kind === "object") {
      return this.mergeObjects(a, b, flags, path);
    }
    if (a.kind === "array" && b.kind === "array") {
      const node: Draft<ArrayNode> = { ...flags, kind: "array", items: a.items, listType: a.listType ?? b.listType };
      this.remember(a, b, node);
      node.items = this.merge(a.items, b.items, [...path, "items"]);
      return node;
    }
    if (a.kind === "map" && b.kind === "map") {
      const node: Draft<MapNode> = { ...flags, kind: "map", value: a.value };
      this.remember(a, b, node);
      node.value = this.merge(a.value, b.value, [...path, "additionalProperties"]);
      return node;
    }
    if (a.kind === "union" && b.kind === "union") {
      return this.mergeUnions(a, b, flags, path);
    }
    if ((a.kind === "scalar" || a.kind === "enumeration") && (b.kind === "scalar" || b.kind === "enumeration")) {
      return this.remember(a, b, this.mergeScalars(a, b, flags, path));
    }

    throw new IrreconcilableUnionError(`versions disagree on the kind of schema: ${a.kind} vs ${b.kind}`, path, {
      kinds: [a.kind, b.kind],
    });
  }

  private mergeObjects(a: ObjectNode, b: ObjectNode, flags: SchemaFlags, path: readonly string[]): ObjectNode {
    const properties = new Map<string, SchemaNode>();
    // A field stays required only if every version requires it
    const required = new Set([...a.required].filter((name) => b.required.has(name)));
    const node: ObjectNode = { ...flags, kind: "object", properties, required };
    this.remember(a, b, node);

    for (const [name, left] of a.properties) {
      const right = b.properties.get(name);
      properties.set(name, right === undefined ? left : this.merge(left, right, [...path, name]));
    }
    for (const [name, right] of b.properties) {
      if (!properties.has(name)) {
        properties.set(name, right);
      }
    }
    return node;
  }

  private mergeUnions(a: UnionNode, b: UnionNode, flags: SchemaFlags, path: readonly string[]): UnionNode {
    if (a.variants.length !== b.variants.length) {
      throw new IrreconcilableUnionError(
        `versions disagree on the number of ${a.combinator} variants: ${a.variants.length} vs ${b.variants.length}`,
        path
      );
    }
    const variants: SchemaNode[] = [];
    const node: UnionNode = { ...flags, kind: "union", combinator: a.combinator, variants };
    this.remember(a, b, node);

    a.variants.forEach((left, index) => {
      const right = b.variants[index];
      variants.push(right === undefined ? left : this.merge(left, right, [...path, `${a.combinator}[${index}]`]));
    });
    return node;
  }

  private mergeScalars(
    a: ScalarNode | EnumerationNode,
    b: ScalarNode | EnumerationNode,
    flags: SchemaFlags,
    path: readonly string[]
  ): ScalarNode | EnumerationNode {
    if (a.scalar !== b.scalar) {
      throw new IrreconcilableUnionError(`versions disagree on scalar type: ${a.scalar} vs ${b.scalar}`, path, {
        scalars: [a.scalar, b.scalar],
      });
    }

    if (a.kind === "enumeration" && b.kind === "enumeration") {
      const seen = new Set(a.literals.map(literalKey));
      const literals = [...a.literals, ...b.literals.filter((literal) => !seen.has(literalKey(literal)))];
      return { ...flags, kind: "enumeration", scalar: a.scalar, literals };
    }

    // A plain scalar accepts every literal of an enumeration
    const formats = [a, b].map((node) => (node.kind === "scalar" ? node.format : undefined));
    const [left, right] = formats;
    const format = a.kind === "scalar" && b.kind === "scalar" ? (left === right ? left : undefined) : (left ?? right);
    if (a.kind === "scalar" && b.kind === "scalar" && left !== right) {
      logger.debug({ path: formatPath(path), formats }, "Versions disagree on format, dropping it");
    }
    const node: ScalarNode = { ...flags, kind: "scalar", scalar: a.scalar };
    return format === undefined ? node : { ...node, format };
  }

  private remember<N extends SchemaNode>(a: SchemaNode, b: SchemaNode, node: N): N {
    const byRight = this.memo.get(a) ?? new Map<SchemaNode, SchemaNode>();
    byRight.set(b, node);
    this.memo.set(a, byRight);
    return node;
  }
}

// =============================================================================
// Version Reconciler
// =============================================================================

export class VersionReconciler implements IVersionReconciler {
  listVersions(versions: readonly SchemaVersion[]): SchemaVersion[] {
    return [...versions].sort((a, b) => compareVersions(b.name, a.name));
  }

  select(
    versions: readonly SchemaVersion[],
    options: SelectOptions = {}
  ): Result<SelectedSchema, ReconcileError | AnalysisError> {
    return tryCatch(() => this.selectOrThrow(versions, options), isReconcileFailure);
  }

  private selectOrThrow(versions: readonly SchemaVersion[], options: SelectOptions): SelectedSchema {
    const ordered = this.listVersions(versions);
    const labels = ordered.map((version) => version.name);

    if (ordered.length === 0) {
      throw new ReconcileError("the resource definition has no versions", ErrorCode.RECONCILE_NO_VERSIONS);
    }
    const duplicates = labels.filter((label, index) => labels.indexOf(label) !== index);
    if (duplicates.length > 0) {
      throw new ReconcileError(`duplicate version labels: ${[...new Set(duplicates)].join(", ")}`, ErrorCode.RECONCILE_AMBIGUOUS, {
        versions: labels,
      });
    }

    if (options.pin !== undefined && options.combine) {
      throw new ReconcileError("a pinned version cannot be combined with merging all versions", ErrorCode.RECONCILE_FAILED, {
        versions: labels,
      });
    }

    if (options.combine) {
      return this.combine(ordered, options.kind);
    }

    if (options.pin !== undefined) {
      const pinned = ordered.find((version) => version.name === options.pin);
      if (!pinned) {
        throw new ReconcileError(
          `version "${options.pin}" not found; available versions: ${labels.join(", ")}`,
          ErrorCode.RECONCILE_VERSION_NOT_FOUND,
          { versions: labels }
        );
      }
      return this.selected(pinned, "pinned");
    }

    const storage = ordered.filter((version) => version.storage);
    const [only] = storage;
    if (storage.length > 1) {
      throw new ReconcileError(
        `several storage versions: ${storage.map((version) => version.name).join(", ")}`,
        ErrorCode.RECONCILE_AMBIGUOUS,
        { versions: labels }
      );
    }
    if (only) {
      return this.selected(only, "storage");
    }

    const [best] = ordered;
    const served = ordered.find((version) => version.served);
    if (served) {
      return this.selected(served, "highest-priority served");
    }
    if (!best) {
      throw new ReconcileError("the resource definition has no versions", ErrorCode.RECONCILE_NO_VERSIONS);
    }
    return this.selected(best, "highest-priority");
  }

  private combine(ordered: readonly SchemaVersion[], kind: string | undefined): SelectedSchema {
    const [first, ...rest] = ordered;
    if (!first) {
      throw new ReconcileError("the resource definition has no versions", ErrorCode.RECONCILE_NO_VERSIONS);
    }

    ordered.forEach(usable);
    const merger = new SchemaMerger();
    const rootPath = kind === undefined ? [] : [kind];
    let root = first.schema;
    for (const version of rest) {
      logger.debug({ into: first.name, from: version.name }, "Merging version schema");
      root = merger.merge(root, version.schema, rootPath);
    }

    const sources = ordered.map((version) => version.name);
    logger.debug({ versions: sources }, "Combined versions");
    return { version: sources.join("+"), sources, root };
  }

  private selected(version: SchemaVersion, reason: string): SelectedSchema {
    logger.debug({ version: version.name, reason }, "Selected version");
    return { version: version.name, sources: [version.name], root: usable(version).schema };
  }
}

/**
 * Create a version reconciler.
 */
export function createVersionReconciler(): VersionReconciler {
  return new VersionReconciler();
}
