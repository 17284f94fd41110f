/**
 * versions command - List the versions of a CustomResourceDefinition
 */

import chalk from "chalk";

import { loadCrd } from "../../core/crd/loader.js";
import { createVersionReconciler } from "../../core/reconciliation/impl/VersionReconciler.js";
import { formatVersions } from "../format.js";

export interface VersionsOptions {
  relaxed?: boolean;
}

/**
 * Show every version in priority order and mark the one selected by default
 */
export async function versionsCommand(file: string, options: VersionsOptions): Promise<void> {
  const crd = await loadCrd(file, { relaxed: options.relaxed ?? false });
  if (!crd.ok) throw crd.error;

  const reconciler = createVersionReconciler();
  const selected = reconciler.select(crd.value.versions);

  console.log(chalk.cyan.bold(`${crd.value.kind}.${crd.value.group}`));
  console.log(formatVersions(reconciler.listVersions(crd.value.versions), selected.ok ? selected.value.version : undefined));
  if (!selected.ok) {
    console.log(chalk.yellow(`No default version: ${selected.error.message}`));
  }
}
