/**
 * Text rendering of type graphs for the terminal
 */

import type { TypeGraph } from "../core/type-graph/type-graph.js";
import { describeRef, type GeneratedType } from "../core/type-graph/types.js";
import type { SchemaVersion } from "../core/reconciliation/interfaces/IReconciliation.js";

function keyword(type: GeneratedType): string {
  if (type.kind === "composite") return "struct";
  return type.shape === "unit" ? "enum" : "union";
}

function header(type: GeneratedType): string {
  const capabilities = type.capabilities.length > 0 ? ` [${type.capabilities.join(", ")}]` : "";
  const elided = type.elided ? " (elided)" : "";
  return `${keyword(type)} ${type.name}${capabilities}${elided}`;
}

function members(type: GeneratedType): string[] {
  if (type.kind === "composite") {
    return type.fields.map((field) => {
      const fallback = field.defaultValue === undefined ? "" : ` = ${JSON.stringify(field.defaultValue)}`;
      return `${field.name}: ${describeRef(field.type)}${fallback}`;
    });
  }
  if (type.shape === "unit") {
    return type.variants.map((variant) => `${variant.name} = ${JSON.stringify(variant.literal)}`);
  }
  return type.variants.map((variant) => `${variant.name}(${describeRef(variant.type)})`);
}

/**
 * One block per type in graph order, then the diagnostics.
 */
export function formatSummary(graph: TypeGraph): string {
  const { kind, version } = graph.metadata;
  const lines = [`${kind} ${version}: ${graph.size} ${graph.size === 1 ? "type" : "types"}`];

  for (const type of graph.types) {
    lines.push("", header(type));
    for (const member of members(type)) {
      lines.push(`  ${member}`);
    }
    for (const withheld of type.withheld) {
      lines.push(`  # no ${withheld.capability}: ${withheld.reason}`);
    }
  }

  if (graph.diagnostics.length > 0) {
    lines.push("", "diagnostics:");
    for (const diagnostic of graph.diagnostics) {
      lines.push(`  [${diagnostic.code}] ${diagnostic.path}: ${diagnostic.message}`);
    }
  }
  return lines.join("\n");
}

/**
 * Version table, highest priority first; `*` marks the default selection.
 */
export function formatVersions(versions: readonly SchemaVersion[], selected?: string): string {
  const width = Math.max(...versions.map((version) => version.name.length));
  return versions
    .map((version) => {
      const flags = [
        version.served ? "served" : "",
        version.storage ? "storage" : "",
        version.parseError ? "invalid schema" : "",
      ]
        .filter(Boolean)
        .join(" ");
      const marker = version.name === selected ? "* " : "  ";
      return `${marker}${version.name.padEnd(width)}  ${flags}`.trimEnd();
    })
    .join("\n");
}
