/**
 * Property Overrides
 *
 * User rules that replace a property's generated type with a named external
 * type, or drop the property altogether. A rule matches on the property name
 * (exact or regular expression), on the property schema (subset or
 * exhaustive), or both.
 *
 * Rules are evaluated in declaration order. Rules with exact names are also
 * indexed by name and consulted first.
 *
 * @module
 */

import { ConfigurationError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import type { PropertyRule } from "../../utils/validation.js";
import { parseSchema } from "../schema/parser.js";
import type { SchemaNode } from "../schema/model.js";
import { matchesSchema, type SchemaMatchMode } from "./schema-match.js";

const logger = createLogger("overrides");

// =============================================================================
// Types
// =============================================================================

export type PropertyAction = { kind: "replace"; typeName: string } | { kind: "omit" };

interface CompiledRule {
  /** Position in the combined rule list */
  position: number;
  exact: ReadonlySet<string>;
  regexes: RegExp[];
  schema?: { mode: SchemaMatchMode; pattern: SchemaNode };
  action: PropertyAction;
}

// =============================================================================
// Compilation
// =============================================================================

function compileRule(
  rule: PropertyRule,
  position: number,
  issues: string[]
): CompiledRule | undefined {
  const exact = new Set<string>();
  const regexes: RegExp[] = [];
  let valid = true;

  for (const name of rule.matchName) {
    if ("exact" in name) {
      exact.add(name.exact);
      continue;
    }
    try {
      regexes.push(new RegExp(name.regex));
    } catch (error) {
      valid = false;
      issues.push(`propertyRules[${position}]: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  let schema: CompiledRule["schema"];
  if (rule.matchSchema) {
    const [mode, raw] =
      "subset" in rule.matchSchema
        ? (["subset", rule.matchSchema.subset] as const)
        : (["exhaustive", rule.matchSchema.exhaustive] as const);
    const parsed = parseSchema(raw, { relaxed: true, path: ["matchSchema"] });
    if (parsed.ok) {
      schema = { mode, pattern: parsed.value.root };
    } else {
      valid = false;
      issues.push(`propertyRules[${position}]: ${parsed.error.message}`);
    }
  }

  const action: PropertyAction =
    rule.matchSuccess === "omit" ? { kind: "omit" } : { kind: "replace", typeName: rule.matchSuccess.replace };

  return valid ? { position, exact, regexes, schema, action } : undefined;
}

// =============================================================================
// Overrides
// =============================================================================

export class PropertyOverrides {
  private readonly index = new Map<string, CompiledRule[]>();
  /** Rules that can match names outside the index */
  private readonly scanned: CompiledRule[];

  private constructor(private readonly rules: readonly CompiledRule[]) {
    for (const rule of rules) {
      for (const name of rule.exact) {
        const bucket = this.index.get(name);
        if (bucket) {
          bucket.push(rule);
        } else {
          this.index.set(name, [rule]);
        }
      }
    }
    this.scanned = rules.filter((rule) => rule.exact.size === 0 || rule.regexes.length > 0);
  }

  static empty(): PropertyOverrides {
    return new PropertyOverrides([]);
  }

  /**
   * Compile rules. Every regular expression is tried, and all failures are
   * reported in one error.
   */
  static compile(rules: readonly PropertyRule[]): Result<PropertyOverrides, ConfigurationError> {
    const issues: string[] = [];
    const compiled: CompiledRule[] = [];
    rules.forEach((rule, position) => {
      const result = compileRule(rule, position, issues);
      if (result) compiled.push(result);
    });

    if (issues.length > 0) {
      return err(new ConfigurationError("Failed to compile property override rules", issues));
    }
    logger.debug({ rules: compiled.length, indexedNames: compiled.reduce((n, r) => n + r.exact.size, 0) }, "Compiled overrides");
    return ok(new PropertyOverrides(compiled));
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Append another set of rules after these ones.
   */
  extend(other: PropertyOverrides): PropertyOverrides {
    const offset = this.rules.length;
    return new PropertyOverrides([
      ...this.rules,
      ...other.rules.map((rule) => ({ ...rule, position: rule.position + offset })),
    ]);
  }

  /**
   * The action of the first rule matching the property, if any.
   */
  match(name: string, node: SchemaNode): PropertyAction | undefined {
    const indexed = this.index.get(name)?.find((candidate) => this.schemaMatches(candidate, node));
    const earlier = this.scanned.find(
      (candidate) =>
        (indexed === undefined || candidate.position < indexed.position) && this.isMatch(candidate, name, node)
    );
    const rule = earlier ?? indexed;
    if (rule) {
      logger.debug({ property: name, rule: rule.position, action: rule.action.kind }, "Property override matched");
    }
    return rule?.action;
  }

  private isMatch(rule: CompiledRule, name: string, node: SchemaNode): boolean {
    const hasNameMatchers = rule.exact.size > 0 || rule.regexes.length > 0;
    if (hasNameMatchers && !rule.exact.has(name) && !rule.regexes.some((regex) => regex.test(name))) {
      return false;
    }
    return this.schemaMatches(rule, node);
  }

  private schemaMatches(rule: CompiledRule, node: SchemaNode): boolean {
    return rule.schema === undefined || matchesSchema(rule.schema.mode, rule.schema.pattern, node);
  }
}
