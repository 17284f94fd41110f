/**
 * Multi-Version Reconciler Interface
 *
 * Defines the contract for turning the versions of a resource definition
 * into the single schema the graph builder works on.
 */

import type { SchemaNode } from "../../schema/model.js";
import type { Result } from "../../../types/result.js";
import type { AnalysisError, Diagnostic, ReconcileError } from "../../errors.js";

// =============================================================================
// Versions
// =============================================================================

/**
 * One version entry of a resource definition
 */
export interface SchemaVersion {
  name: string;
  served: boolean;
  storage: boolean;
  schema: SchemaNode;
  /** Relaxed-mode diagnostics from parsing this version's schema */
  diagnostics?: readonly Diagnostic[];
  /** Why the schema could not be parsed; `schema` is then a placeholder */
  parseError?: AnalysisError;
}

export interface SelectOptions {
  /** Use exactly this version */
  pin?: string;

  /** Merge every version instead of picking one */
  combine?: boolean;

  /** Resource kind; first segment of the paths in merge errors */
  kind?: string;
}

/**
 * The operative schema
 */
export interface SelectedSchema {
  /** Chosen label, or the merged labels joined by "+" in priority order */
  version: string;

  /** Labels that contributed, highest priority first */
  sources: string[];

  root: SchemaNode;
}

// =============================================================================
// Reconciler Interface
// =============================================================================

export interface IVersionReconciler {
  /**
   * Pick (or merge) the operative schema.
   */
  select(
    versions: readonly SchemaVersion[],
    options?: SelectOptions
  ): Result<SelectedSchema, ReconcileError | AnalysisError>;

  /**
   * Version labels from highest to lowest priority
   */
  listVersions(versions: readonly SchemaVersion[]): SchemaVersion[];
}
