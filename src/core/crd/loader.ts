/**
 * CustomResourceDefinition Loader
 *
 * Reads a CustomResourceDefinition from YAML or JSON, validates its
 * envelope and parses the schema of every version into the Schema Model.
 * A version whose schema does not parse keeps its error, which is raised
 * once that version is selected.
 * Both the current per-version schemas and the legacy shared
 * `spec.validation` schema are understood.
 *
 * @module
 */

import * as yaml from "js-yaml";

import { ErrorCode, SchemaLoadError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { unknownNode } from "../schema/model.js";
import { parseSchema } from "../schema/parser.js";
import type { SchemaVersion } from "../reconciliation/interfaces/IReconciliation.js";
import { isJsonPath, readFileWithEncoding } from "../../utils/fs.js";
import { isRecord } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";
import {
  CustomResourceDefinitionSchema,
  formatZodError,
  safeValidate,
  type CustomResourceDefinition,
} from "../../utils/validation.js";

const logger = createLogger("crd-loader");

// =============================================================================
// Types
// =============================================================================

export interface LoadedCrd {
  /** metadata.name, e.g. `widgets.example.com` */
  name?: string;
  group: string;
  kind: string;
  plural?: string;
  versions: SchemaVersion[];
}

export interface LoadOptions {
  /** Downgrade unsupported schema constructs to diagnostics */
  relaxed?: boolean;
  maxDepth?: number;
  /** File name for messages; a `.json` name selects JSON parsing */
  source?: string;
}

export type LoadError = SchemaLoadError;

// =============================================================================
// Decoding
// =============================================================================

function decode(text: string, source: string): Result<unknown[], SchemaLoadError> {
  try {
    if (isJsonPath(source)) {
      return ok([JSON.parse(text)]);
    }
    return ok(yaml.loadAll(text, undefined, { filename: source }).filter((document) => document != null));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new SchemaLoadError(`Cannot parse ${source}: ${reason}`, ErrorCode.SCHEMA_LOAD_FAILED, { filePath: source }));
  }
}

function findDefinition(documents: unknown[], source: string): Result<unknown, SchemaLoadError> {
  const definitions = documents.filter((document) => isRecord(document) && document.kind === "CustomResourceDefinition");
  const [only] = definitions;
  if (definitions.length > 1) {
    return err(
      new SchemaLoadError(
        `Expected one CustomResourceDefinition, found ${definitions.length}`,
        ErrorCode.SCHEMA_DOCUMENT_INVALID,
        { filePath: source }
      )
    );
  }
  if (only === undefined) {
    return err(
      new SchemaLoadError("No CustomResourceDefinition found", ErrorCode.SCHEMA_DOCUMENT_INVALID, { filePath: source })
    );
  }
  return ok(only);
}

interface RawVersion {
  name: string;
  served: boolean;
  storage: boolean;
  schema: unknown;
}

/**
 * Version entries with the schema each one uses.
 */
function rawVersions(crd: CustomResourceDefinition, source: string): Result<RawVersion[], SchemaLoadError> {
  const shared = crd.spec.validation?.openAPIV3Schema;
  const entries: RawVersion[] = crd.spec.versions.map((version) => ({
    name: version.name,
    served: version.served,
    storage: version.storage,
    schema: version.schema?.openAPIV3Schema ?? shared,
  }));

  if (entries.length === 0 && crd.spec.version !== undefined) {
    entries.push({ name: crd.spec.version, served: true, storage: true, schema: shared });
  }
  if (entries.length === 0) {
    return err(
      new SchemaLoadError(`${crd.spec.names.kind} declares no versions`, ErrorCode.SCHEMA_DOCUMENT_INVALID, {
        filePath: source,
      })
    );
  }

  const missing = entries.filter((entry) => entry.schema === undefined).map((entry) => entry.name);
  if (missing.length > 0) {
    return err(
      new SchemaLoadError(`No openAPIV3Schema for version ${missing.join(", ")}`, ErrorCode.SCHEMA_DOCUMENT_INVALID, {
        filePath: source,
        versions: missing,
      })
    );
  }
  return ok(entries);
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse the text of a CustomResourceDefinition document.
 */
export function parseCrd(text: string, options: LoadOptions = {}): Result<LoadedCrd, LoadError> {
  const source = options.source ?? "<inline>";

  const documents = decode(text, source);
  if (!documents.ok) return documents;
  const document = findDefinition(documents.value, source);
  if (!document.ok) return document;

  const validated = safeValidate(CustomResourceDefinitionSchema, document.value);
  if (!validated.success) {
    const issues = formatZodError(validated.error);
    return err(
      new SchemaLoadError(`Invalid CustomResourceDefinition in ${source}`, ErrorCode.SCHEMA_DOCUMENT_INVALID, {
        filePath: source,
        issues,
      })
    );
  }
  const crd = validated.data;
  const kind = crd.spec.names.kind;

  const entries = rawVersions(crd, source);
  if (!entries.ok) return entries;

  const versions: SchemaVersion[] = [];
  for (const entry of entries.value) {
    const parsed = parseSchema(entry.schema, { relaxed: options.relaxed, maxDepth: options.maxDepth, path: [kind] });
    // Only a version that gets selected has to parse
    if (!parsed.ok) {
      logger.debug({ source, version: entry.name, reason: parsed.error.message }, "Version schema failed to parse");
      versions.push({
        name: entry.name,
        served: entry.served,
        storage: entry.storage,
        schema: unknownNode(),
        parseError: parsed.error,
      });
      continue;
    }
    versions.push({
      name: entry.name,
      served: entry.served,
      storage: entry.storage,
      schema: parsed.value.root,
      diagnostics: parsed.value.diagnostics,
    });
  }

  logger.debug({ source, kind, versions: versions.map((version) => version.name) }, "Loaded CustomResourceDefinition");
  return ok({
    name: crd.metadata?.name,
    group: crd.spec.group,
    kind,
    plural: crd.spec.names.plural,
    versions,
  });
}

/**
 * Read and parse a CustomResourceDefinition file.
 */
export async function loadCrd(filePath: string, options: Omit<LoadOptions, "source"> = {}): Promise<Result<LoadedCrd, LoadError>> {
  let text: string;
  try {
    text = await readFileWithEncoding(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new SchemaLoadError(`Cannot read ${filePath}: ${reason}`, ErrorCode.SCHEMA_LOAD_FAILED, { filePath }));
  }
  return parseCrd(text, { ...options, source: filePath });
}
