/**
 * Synthesis Configuration
 *
 * Validates the configuration record and expands its shorthands. Everything
 * downstream receives a complete, checked {@link SynthesisConfig}.
 *
 * @module
 */

import { z } from "zod";

import { ConfigurationError } from "./errors.js";
import { err, ok, type Result } from "../types/result.js";
import { SynthesisConfigSchema, formatZodError, safeValidate } from "../utils/validation.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("config");

export type SynthesisConfig = z.infer<typeof SynthesisConfigSchema>;

export type { SynthesisConfigInput } from "../utils/validation.js";

/**
 * Validate a configuration record. `auto` turns on derived schema mode
 * (which requests reflection everywhere) and docs.
 */
export function parseConfig(input: unknown = {}): Result<SynthesisConfig, ConfigurationError> {
  const result = safeValidate(SynthesisConfigSchema, input);
  if (!result.success) {
    const issues = formatZodError(result.error);
    logger.debug({ issues }, "Invalid configuration");
    return err(new ConfigurationError("Invalid configuration", issues));
  }

  const config = result.data;
  if (config.auto) {
    return ok({ ...config, schemaMode: "derived", enableDocs: true });
  }
  return ok(config);
}
