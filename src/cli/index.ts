#!/usr/bin/env node

/**
 * crd-synth CLI
 * Inspect CustomResourceDefinitions and the type graphs synthesized from them
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { generateCommand } from "./commands/generate.js";
import { versionsCommand } from "./commands/versions.js";
import { ConfigurationError, isCrdSynthError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

/** Accumulates a repeatable option */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseDepth(value: string): number {
  return Number.parseInt(value, 10);
}

// Create the main program
const program = new Command();

program
  .name("crd-synth")
  .description("Synthesize language-agnostic type graphs from Kubernetes CustomResourceDefinitions")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("generate")
  .description("Print the type graph of a CustomResourceDefinition file")
  .argument("<file>", "CustomResourceDefinition (YAML or JSON)")
  .option("--api-version <version>", "Use exactly this version")
  .option("--combine", "Merge every version into one schema")
  .option("-d, --docs", "Keep schema descriptions")
  .option("-b, --builders", "Request builders for every struct")
  .addOption(new Option("--schema <mode>", "Schema reflection mode").choices(["disabled", "manual", "derived"]))
  .option("-D, --derive <request>", "Request a capability: cap, Type=cap, @struct=cap, @enum=cap, @enum:simple=cap", collect, [])
  .option("-e, --elide <type>", "Flag a type as elided", collect, [])
  .option("--relaxed", "Report unsupported constructs as warnings")
  .option("--no-condition", "Do not substitute the standard Condition type")
  .option("--no-object-reference", "Do not substitute the standard ObjectReference type")
  .option("--no-object-meta", "Do not substitute the standard ObjectMeta type")
  .addOption(new Option("--map-type <representation>", "Map representation").choices(["ordered", "unordered"]))
  .option("-A, --auto", "Derived schema mode with reflection and docs")
  .addOption(new Option("--naming <strategy>", "Type naming strategy").choices(["qualified", "shortest"]))
  .option("--max-depth <depth>", "Maximum schema nesting depth", parseDepth)
  .option("--overrides <file>", "Property overrides file (repeatable)", collect, [])
  .addOption(new Option("--format <format>", "Output format").choices(["json", "summary"]).default("summary"))
  .action(generateCommand);

program
  .command("versions")
  .description("List the versions of a CustomResourceDefinition file")
  .argument("<file>", "CustomResourceDefinition (YAML or JSON)")
  .option("--relaxed", "Report unsupported constructs as warnings")
  .action(versionsCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Print the error, with its path or issues where it has them, and exit
 */
function handleError(error: unknown): void {
  if (isCrdSynthError(error)) {
    logger.debug({ err: error }, "Command failed");
    console.error(chalk.red(error.toString()));
    if (error instanceof ConfigurationError) {
      for (const issue of error.issues) {
        console.error(chalk.red(`  - ${issue}`));
      }
    }
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
