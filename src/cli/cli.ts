/**
 * CLI configuration
 */

import { Command } from "commander";
import { createInitCommand } from "./commands/init.js";
import { createConfigureCommand } from "./commands/configure.js";
import { createInvalidateCommand } from "./commands/invalidate.js";
import { createStatusCommand } from "./commands/status.js";
import { createMigrateCommand } from "./commands/migrate.js";
import { readFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      packageJson &&
      typeof packageJson === "object" &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
  } catch (error: unknown) {
    if (process.env.CFI_DEBUG === "true") {
      console.error(`[cfi] Could not read package version: ${String(error)}`);
    }
  }
  return "0.0.0";
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("cfi")
    .description("Encrypted credentials and validated CloudFront cache invalidations")
    .version(getVersion());

  // Add commands
  program.addCommand(createInitCommand());
  program.addCommand(createConfigureCommand());
  program.addCommand(createInvalidateCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createMigrateCommand());

  return program;
}
