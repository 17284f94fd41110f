/**
 * Derivation Module
 *
 * Capability requests and their resolution against a type graph.
 *
 * @module
 */

export {
  appliesTo,
  canonicalCapabilities,
  parseCapabilityRequest,
  parseCapabilityRequests,
  type CapabilityRequest,
  type CapabilityTarget,
} from "./capabilities.js";
export { DerivationResolver, resolveDerivations, type ResolveOptions } from "./resolver.js";
