/**
 * generate command - Synthesize the type graph of a CustomResourceDefinition
 */

import chalk from "chalk";

import { createLogger } from "../../utils/logger.js";
import { loadCrd } from "../../core/crd/loader.js";
import { loadOverrides } from "../../core/overrides/loader.js";
import { parseConfig } from "../../core/config.js";
import { synthesize } from "../../core/synthesis.js";
import type { PropertyRule } from "../../utils/validation.js";
import { formatSummary } from "../format.js";

const logger = createLogger("generate");

export type OutputFormat = "json" | "summary";

export interface GenerateOptions {
  apiVersion?: string;
  combine?: boolean;
  docs?: boolean;
  builders?: boolean;
  schema?: string;
  derive: string[];
  elide: string[];
  relaxed?: boolean;
  /** `--no-condition` sets these to false */
  condition: boolean;
  objectReference: boolean;
  objectMeta: boolean;
  mapType?: string;
  auto?: boolean;
  naming?: string;
  maxDepth?: number;
  overrides: string[];
  format: OutputFormat;
}

/**
 * Map command-line flags onto an (unvalidated) configuration record.
 */
export function toConfigInput(options: GenerateOptions, overrides: readonly PropertyRule[]): Record<string, unknown> {
  const suppressKnownShape: string[] = [];
  if (!options.condition) suppressKnownShape.push("condition");
  if (!options.objectReference) suppressKnownShape.push("object-reference");
  if (!options.objectMeta) suppressKnownShape.push("object-meta");

  return {
    versionPin: options.apiVersion,
    combineVersions: options.combine ?? false,
    enableDocs: options.docs ?? false,
    enableBuilders: options.builders ?? false,
    schemaMode: options.schema,
    extraCapabilities: options.derive,
    elide: options.elide,
    relaxed: options.relaxed ?? false,
    suppressKnownShape,
    mapRepresentation: options.mapType,
    auto: options.auto ?? false,
    naming: options.naming,
    maxDepth: options.maxDepth,
    overrides: [...overrides],
  };
}

/**
 * Synthesize and print the type graph of a CustomResourceDefinition file
 */
export async function generateCommand(file: string, options: GenerateOptions): Promise<void> {
  logger.debug({ file, options }, "Generating type graph");

  const rules = await loadOverrides(options.overrides);
  if (!rules.ok) throw rules.error;

  const config = parseConfig(toConfigInput(options, rules.value));
  if (!config.ok) throw config.error;

  const crd = await loadCrd(file, { relaxed: config.value.relaxed, maxDepth: config.value.maxDepth });
  if (!crd.ok) throw crd.error;

  const graph = synthesize(crd.value, config.value);
  if (!graph.ok) throw graph.error;

  if (options.format === "json") {
    console.log(JSON.stringify(graph.value, null, 2));
  } else {
    console.log(formatSummary(graph.value));
  }

  for (const diagnostic of graph.value.diagnostics) {
    console.error(chalk.yellow(`warning: ${diagnostic.message} at ${diagnostic.path}`));
  }
  logger.info({ kind: crd.value.kind, types: graph.value.size }, "Type graph generated");
}
