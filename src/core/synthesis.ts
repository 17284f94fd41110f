/**
 * Synthesis Pipeline
 *
 * Configuration → version selection → type graph → capabilities → frozen
 * graph. Each stage either hands a value to the next or stops the pipeline
 * with its error; no partial graph is ever returned.
 *
 * @module
 */

import { createLogger } from "../utils/logger.js";
import { err, ok, type Result } from "../types/result.js";
import type { Diagnostic, SynthesisError } from "./errors.js";
import { parseConfig, type SynthesisConfigInput } from "./config.js";
import { parseCapabilityRequests } from "./derivation/capabilities.js";
import { resolveDerivations } from "./derivation/resolver.js";
import { buildTypeGraph } from "./graph-builder/type-graph-builder.js";
import { createKnownShapeService } from "./known-shapes/service.js";
import { PropertyOverrides } from "./overrides/property-overrides.js";
import { createVersionReconciler } from "./reconciliation/impl/VersionReconciler.js";
import type { SchemaVersion } from "./reconciliation/interfaces/IReconciliation.js";
import type { TypeGraph } from "./type-graph/type-graph.js";

const logger = createLogger("synthesis");

export interface SynthesisInput {
  /** Resource kind; names the root type */
  kind: string;
  versions: readonly SchemaVersion[];
}

/**
 * Run the whole analysis for one resource.
 *
 * @example
 * ```typescript
 * const result = synthesize({ kind: "Agent", versions }, { naming: "shortest" });
 * if (!result.ok) console.error(result.error.toString());
 * ```
 */
export function synthesize(
  input: SynthesisInput,
  configInput: SynthesisConfigInput = {}
): Result<TypeGraph, SynthesisError> {
  const configured = parseConfig(configInput);
  if (!configured.ok) return configured;
  const config = configured.value;

  const overrides = PropertyOverrides.compile(config.overrides);
  if (!overrides.ok) return overrides;

  const requests = parseCapabilityRequests(config.extraCapabilities);
  if (!requests.ok) return requests;

  const selected = createVersionReconciler().select(input.versions, {
    pin: config.versionPin,
    combine: config.combineVersions,
    kind: input.kind,
  });
  if (!selected.ok) return selected;
  const { version, sources, root } = selected.value;

  const diagnostics: Diagnostic[] = input.versions
    .filter((entry) => sources.includes(entry.name))
    .flatMap((entry) => entry.diagnostics ?? []);

  logger.debug({ kind: input.kind, version, naming: config.naming }, "Building type graph");
  const built = buildTypeGraph(root, {
    kind: input.kind,
    version,
    naming: config.naming,
    maxDepth: config.maxDepth,
    relaxed: config.relaxed,
    enableDocs: config.enableDocs,
    mapRepresentation: config.mapRepresentation,
    schemaMode: config.schemaMode,
    knownShapes: createKnownShapeService({ suppress: config.suppressKnownShape }),
    overrides: overrides.value,
    diagnostics,
  });
  if (!built.ok) return err(built.error);

  const graph = resolveDerivations(built.value, {
    requests: requests.value,
    enableBuilders: config.enableBuilders,
    schemaMode: config.schemaMode,
    elide: config.elide,
    enableDocs: config.enableDocs,
  });

  logger.debug(
    { kind: input.kind, version, types: graph.size, diagnostics: graph.diagnostics.length },
    "Synthesis complete"
  );
  return ok(graph.freeze());
}
