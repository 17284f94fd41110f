/**
 * Capability requests
 *
 * Requests are written as strings:
 * - `equality` asks for a capability on every type
 * - `Widget=ordering` on the type named Widget
 * - `@struct=default` on every composite
 * - `@enum=ordering` on every enumerated type
 * - `@enum:simple=default` on unit enumerations only
 *
 * @module
 */

import { ConfigurationError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { CAPABILITIES, isCapability, type Capability, type GeneratedType } from "../type-graph/types.js";
import { isTypeName } from "../type-graph/naming.js";

export type CapabilityTarget =
  | { scope: "all" }
  | { scope: "type"; name: string }
  | { scope: "struct" }
  | { scope: "enum" }
  | { scope: "simple-enum" };

export interface CapabilityRequest {
  target: CapabilityTarget;
  capability: Capability;
}

const TYPE_CLASSES: Readonly<Record<string, CapabilityTarget>> = {
  "@struct": { scope: "struct" },
  "@enum": { scope: "enum" },
  "@enum:simple": { scope: "simple-enum" },
};

function parseTarget(text: string): CapabilityTarget | string {
  const typeClass = TYPE_CLASSES[text];
  if (typeClass) {
    return typeClass;
  }
  if (text.startsWith("@")) {
    return `unknown type class "${text}" (expected @struct, @enum or @enum:simple)`;
  }
  if (!isTypeName(text)) {
    return `"${text}" is not a type name`;
  }
  return { scope: "type", name: text };
}

/**
 * Parse one request string.
 */
export function parseCapabilityRequest(text: string): Result<CapabilityRequest, string> {
  const trimmed = text.trim();
  const separator = trimmed.indexOf("=");
  const capability = separator === -1 ? trimmed : trimmed.slice(separator + 1).trim();

  if (!isCapability(capability)) {
    return err(`unknown capability "${capability}" in "${text}" (expected one of ${CAPABILITIES.join(", ")})`);
  }
  if (separator === -1) {
    return ok({ target: { scope: "all" }, capability });
  }

  const target = parseTarget(trimmed.slice(0, separator).trim());
  return typeof target === "string" ? err(`${target} in "${text}"`) : ok({ target, capability });
}

/**
 * Parse every request, reporting all malformed ones together.
 */
export function parseCapabilityRequests(texts: readonly string[]): Result<CapabilityRequest[], ConfigurationError> {
  const requests: CapabilityRequest[] = [];
  const issues: string[] = [];
  texts.forEach((text, index) => {
    const parsed = parseCapabilityRequest(text);
    if (parsed.ok) {
      requests.push(parsed.value);
    } else {
      issues.push(`extraCapabilities[${index}]: ${parsed.error}`);
    }
  });
  if (issues.length > 0) {
    return err(new ConfigurationError("Invalid capability requests", issues));
  }
  return ok(requests);
}

export function appliesTo(target: CapabilityTarget, type: GeneratedType): boolean {
  switch (target.scope) {
    case "all":
      return true;
    case "type":
      return target.name === type.name;
    case "struct":
      return type.kind === "composite";
    case "enum":
      return type.kind === "enumerated";
    case "simple-enum":
      return type.kind === "enumerated" && type.shape === "unit";
  }
}

/**
 * Capabilities in canonical order, without repeats.
 */
export function canonicalCapabilities(capabilities: Iterable<Capability>): Capability[] {
  const wanted = new Set(capabilities);
  return CAPABILITIES.filter((capability) => wanted.has(capability));
}
