/**
 * CustomResourceDefinition Module
 *
 * @module
 */

export { parseCrd, loadCrd, type LoadedCrd, type LoadOptions, type LoadError } from "./loader.js";
