/**
 * crd-synth
 *
 * Turns Kubernetes CustomResourceDefinition schemas into a normalized,
 * language-agnostic type graph for code generators.
 *
 * @example
 * ```typescript
 * import { loadCrd, synthesize } from "crd-synth";
 *
 * const crd = await loadCrd("widgets.yaml");
 * if (crd.ok) {
 *   const graph = synthesize(crd.value, { naming: "shortest" });
 * }
 * ```
 */

export * from "./core/index.js";
export { createLogger, type Logger } from "./utils/logger.js";
