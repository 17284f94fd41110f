/**
 * Overrides file loading
 *
 * @module
 */

import * as yaml from "js-yaml";

import { ConfigurationError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { readFileWithEncoding } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { OverridesFileSchema, formatZodError, safeValidate, type PropertyRule } from "../../utils/validation.js";

const logger = createLogger("overrides-loader");

/**
 * Parse the YAML text of an overrides file into its property rules.
 */
export function parseOverrides(text: string, source = "<inline>"): Result<PropertyRule[], ConfigurationError> {
  let document: unknown;
  try {
    document = yaml.load(text, { filename: source });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigurationError(`Invalid YAML in overrides file ${source}`, [reason]));
  }

  const validated = safeValidate(OverridesFileSchema, document ?? {});
  if (!validated.success) {
    return err(new ConfigurationError(`Invalid overrides file ${source}`, formatZodError(validated.error)));
  }
  return ok(validated.data.propertyRules);
}

/**
 * Load several overrides files, concatenating their rules in order.
 */
export async function loadOverrides(paths: readonly string[]): Promise<Result<PropertyRule[], ConfigurationError>> {
  const rules: PropertyRule[] = [];
  for (const filePath of paths) {
    let text: string;
    try {
      text = await readFileWithEncoding(filePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new ConfigurationError(`Cannot read overrides file ${filePath}`, [reason]));
    }
    const parsed = parseOverrides(text, filePath);
    if (!parsed.ok) return parsed;
    logger.debug({ filePath, rules: parsed.value.length }, "Loaded overrides file");
    rules.push(...parsed.value);
  }
  return ok(rules);
}
