/**
 * Reconciliation Module
 *
 * Selects or merges the versions of a resource definition into the single
 * schema the graph builder analyzes.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Version ordering
export * from "./version.js";

// Implementation
export * from "./impl/VersionReconciler.js";
