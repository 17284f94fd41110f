/**
 * Error Classes for crd-synth
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Schema analysis errors (1xxx)
  UNSUPPORTED_SCHEMA_CONSTRUCT = "E1000",
  NAMING_COLLISION = "E1001",
  IRRECONCILABLE_UNION = "E1002",
  CYCLE_DEPTH_EXCEEDED = "E1003",

  // Version selection errors (2xxx)
  RECONCILE_FAILED = "E2000",
  RECONCILE_VERSION_NOT_FOUND = "E2001",
  RECONCILE_AMBIGUOUS = "E2002",
  RECONCILE_NO_VERSIONS = "E2003",

  // Input errors (3xxx)
  SCHEMA_LOAD_FAILED = "E3000",
  SCHEMA_DOCUMENT_INVALID = "E3001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all crd-synth errors
 */
export class CrdSynthError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CrdSynthError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Create a formatted error message
   */
  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Render a schema path for diagnostics. The root segment is the resource kind.
 */
export function formatPath(path: readonly string[]): string {
  return path.length === 0 ? "<root>" : path.join(".");
}

/**
 * Errors raised while analyzing a schema. Every one of them carries the path
 * of the node that could not be represented.
 */
export class AnalysisError extends CrdSynthError {
  public readonly path: readonly string[];

  constructor(
    message: string,
    code: ErrorCode,
    path: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, path: formatPath(path) });
    this.name = "AnalysisError";
    this.path = [...path];
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message} at ${formatPath(this.path)}`;
  }
}

/**
 * A schema construct with no defined mapping into the type graph
 */
export class UnsupportedSchemaConstructError extends AnalysisError {
  constructor(message: string, path: readonly string[], context?: Record<string, unknown>) {
    super(message, ErrorCode.UNSUPPORTED_SCHEMA_CONSTRUCT, path, context);
    this.name = "UnsupportedSchemaConstructError";
  }
}

/**
 * Two structurally different types that cannot be given distinct names
 */
export class NamingCollisionError extends AnalysisError {
  public readonly candidate: string;

  constructor(message: string, path: readonly string[], context: Record<string, unknown> & { candidate: string }) {
    super(message, ErrorCode.NAMING_COLLISION, path, context);
    this.name = "NamingCollisionError";
    this.candidate = context.candidate;
  }
}

/**
 * Union branches (or version schemas) that no single type can represent
 */
export class IrreconcilableUnionError extends AnalysisError {
  constructor(message: string, path: readonly string[], context?: Record<string, unknown>) {
    super(message, ErrorCode.IRRECONCILABLE_UNION, path, context);
    this.name = "IrreconcilableUnionError";
  }
}

/**
 * Nesting deeper than the configured limit
 */
export class CycleDepthExceededError extends AnalysisError {
  public readonly maxDepth: number;

  constructor(path: readonly string[], maxDepth: number) {
    super(`schema nesting exceeds the maximum depth of ${maxDepth}`, ErrorCode.CYCLE_DEPTH_EXCEEDED, path, {
      maxDepth,
    });
    this.name = "CycleDepthExceededError";
    this.maxDepth = maxDepth;
  }
}

/**
 * Version selection failures
 */
export class ReconcileError extends CrdSynthError {
  public readonly versions: readonly string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RECONCILE_FAILED,
    context?: Record<string, unknown> & { versions?: readonly string[] }
  ) {
    super(message, code, context);
    this.name = "ReconcileError";
    this.versions = context?.versions ?? [];
  }
}

/**
 * Invalid configuration record or overrides file
 */
export class ConfigurationError extends CrdSynthError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { issues });
    this.name = "ConfigurationError";
    this.issues = [...issues];
  }
}

/**
 * Input documents that are not a usable CustomResourceDefinition
 */
export class SchemaLoadError extends CrdSynthError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCHEMA_LOAD_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "SchemaLoadError";
    this.filePath = context?.filePath;
  }

  override toString(): string {
    const location = this.filePath ? ` in ${this.filePath}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * A relaxed-mode downgrade of an analysis error: recorded, not thrown.
 */
export interface Diagnostic {
  code: ErrorCode;
  path: string;
  message: string;
}

export function toDiagnostic(error: AnalysisError): Diagnostic {
  return { code: error.code, path: formatPath(error.path), message: error.message };
}

/**
 * Anything the synthesis pipeline reports instead of a type graph
 */
export type SynthesisError = AnalysisError | ReconcileError | ConfigurationError;

/**
 * Check if an error is a CrdSynthError
 */
export function isCrdSynthError(error: unknown): error is CrdSynthError {
  return error instanceof CrdSynthError;
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}
