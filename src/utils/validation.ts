/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the configuration record, property override files and the
 * CustomResourceDefinition envelope.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Shared
// =============================================================================

/**
 * A decoded JSON/YAML object whose shape is checked elsewhere
 */
export const JsonObjectSchema = z.record(z.unknown());

// =============================================================================
// Property Overrides Schemas
// =============================================================================

/**
 * How a property name is matched
 */
export const PropertyNameSchema = z.union([
  z.object({ exact: z.string().min(1) }).strict(),
  z.object({ regex: z.string().min(1) }).strict(),
]);

export type PropertyName = z.infer<typeof PropertyNameSchema>;

/**
 * How a property schema is matched: `subset` requires at least the given
 * structure, `exhaustive` exactly the given structure
 */
export const PropertySchemaMatchSchema = z.union([
  z.object({ subset: JsonObjectSchema }).strict(),
  z.object({ exhaustive: JsonObjectSchema }).strict(),
]);

export type PropertySchemaMatch = z.infer<typeof PropertySchemaMatchSchema>;

/**
 * What happens to a matched property
 */
export const PropertyActionSchema = z.union([
  z.literal("omit"),
  z.object({ replace: z.string().min(1) }).strict(),
]);

export type PropertyActionInput = z.infer<typeof PropertyActionSchema>;

export const PropertyRuleSchema = z
  .object({
    /** Any one of these must match; absent means "any name" */
    matchName: z.array(PropertyNameSchema).default([]),
    /** Absent means "any schema" */
    matchSchema: PropertySchemaMatchSchema.optional(),
    matchSuccess: PropertyActionSchema,
  })
  .strict();

export type PropertyRuleInput = z.input<typeof PropertyRuleSchema>;
export type PropertyRule = z.infer<typeof PropertyRuleSchema>;

/**
 * Overrides file format
 */
export const OverridesFileSchema = z.object({
  propertyRules: z.array(PropertyRuleSchema).default([]),
});

export type OverridesFile = z.infer<typeof OverridesFileSchema>;

// =============================================================================
// Configuration Schema
// =============================================================================

export const SchemaModeSchema = z.enum(["disabled", "manual", "derived"]);

export const SuppressibleShapeSchema = z.enum(["condition", "object-reference", "object-meta"]);

export const MapRepresentationSchema = z.enum(["ordered", "unordered"]);

export const NamingStrategySchema = z.enum(["qualified", "shortest"]);

export type NamingStrategy = z.infer<typeof NamingStrategySchema>;

/**
 * The synthesis configuration record
 */
export const SynthesisConfigSchema = z
  .object({
    /** Use exactly this version */
    versionPin: z.string().min(1).optional(),

    /** Merge all versions instead of selecting one */
    combineVersions: z.boolean().default(false),

    /** Keep schema descriptions on types and fields */
    enableDocs: z.boolean().default(false),

    /** Request builder-style construction for composites */
    enableBuilders: z.boolean().default(false),

    schemaMode: SchemaModeSchema.default("disabled"),

    /** Capability requests: `cap`, `Type=cap`, `@struct=cap`, `@enum=cap`, `@enum:simple=cap` */
    extraCapabilities: z.array(z.string()).default([]),

    /** Type names to flag as elided */
    elide: z.array(z.string()).default([]),

    /** Downgrade unsupported constructs to diagnostics */
    relaxed: z.boolean().default(false),

    suppressKnownShape: z.array(SuppressibleShapeSchema).default([]),

    mapRepresentation: MapRepresentationSchema.default("ordered"),

    /** Derived schema mode with reflection and docs */
    auto: z.boolean().default(false),

    naming: NamingStrategySchema.default("qualified"),

    maxDepth: z.number().int().positive().default(64),

    overrides: z.array(PropertyRuleSchema).default([]),
  })
  .strict()
  .refine((config) => !(config.versionPin !== undefined && config.combineVersions), {
    message: "versionPin and combineVersions are mutually exclusive",
    path: ["versionPin"],
  });

export type SynthesisConfigInput = z.input<typeof SynthesisConfigSchema>;

// =============================================================================
// CustomResourceDefinition Schemas
// =============================================================================

const ValidationSchema = z
  .object({
    openAPIV3Schema: JsonObjectSchema.optional(),
  })
  .passthrough();

export const CrdVersionSchema = z
  .object({
    name: z.string().min(1),
    served: z.boolean().default(true),
    storage: z.boolean().default(false),
    schema: ValidationSchema.optional(),
  })
  .passthrough();

export const CustomResourceDefinitionSchema = z
  .object({
    apiVersion: z.string().startsWith("apiextensions.k8s.io/"),
    kind: z.literal("CustomResourceDefinition"),
    metadata: z.object({ name: z.string().optional() }).passthrough().optional(),
    spec: z
      .object({
        group: z.string().min(1),
        names: z.object({ kind: z.string().min(1), plural: z.string().optional() }).passthrough(),
        scope: z.string().optional(),
        /** Single-version CRDs (apiextensions.k8s.io/v1beta1) */
        version: z.string().optional(),
        versions: z.array(CrdVersionSchema).default([]),
        /** Schema shared by every version (apiextensions.k8s.io/v1beta1) */
        validation: ValidationSchema.optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type CustomResourceDefinition = z.infer<typeof CustomResourceDefinitionSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<O, I = O>(
  schema: z.ZodType<O, z.ZodTypeDef, I>,
  data: unknown
): ValidationResult<O> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
