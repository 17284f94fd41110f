/**
 * Type Graph Builder Interfaces
 *
 * @module
 */

import type { Diagnostic } from "../errors.js";
import type { IKnownShapeService } from "../known-shapes/interfaces.js";
import type { PropertyOverrides } from "../overrides/property-overrides.js";
import type { MapRepresentation, SchemaMode } from "../type-graph/types.js";
import type { NamingStrategy } from "../../utils/validation.js";

export interface BuildOptions {
  /** Resource kind; names the root type and seeds every path */
  kind: string;

  /** Version label recorded on the graph */
  version?: string;

  /**
   * `qualified` names a type after its full path, `shortest` after the
   * last path segment, widened only on collision (default: qualified)
   */
  naming?: NamingStrategy;

  /** Maximum nesting depth (default: 64) */
  maxDepth?: number;

  /** Downgrade unsupported unions to `unknown` plus a diagnostic */
  relaxed?: boolean;

  /** Keep schema descriptions (default: false) */
  enableDocs?: boolean;

  mapRepresentation?: MapRepresentation;

  schemaMode?: SchemaMode;

  /** Known-shape detection; the default service detects every shape */
  knownShapes?: IKnownShapeService;

  overrides?: PropertyOverrides;

  /** Diagnostics from earlier stages, carried onto the graph */
  diagnostics?: readonly Diagnostic[];
}

export const DEFAULT_BUILD_OPTIONS = {
  naming: "qualified",
  maxDepth: 64,
  relaxed: false,
  enableDocs: false,
  mapRepresentation: "ordered",
  schemaMode: "disabled",
} as const satisfies Partial<BuildOptions>;
