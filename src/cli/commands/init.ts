/**
 * Init command - create cfi.config.ts
 */

import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import { generateExampleConfig } from "../../core/config/utils.js";
import { DEFAULT_SETTINGS_DIR } from "../../core/settings/repository.js";
import { ensureSettingsDirInGitignore } from "../../core/utils/gitignore.js";
import * as logger from "../utils/logger.js";

interface InitOptions {
  force?: boolean;
  settingsDir: string;
}

/**
 * Create init command
 */
export function createInitCommand(): Command {
  const command = new Command("init");

  command
    .description("Create a cfi.config.ts in the current directory")
    .option("-f, --force", "Overwrite an existing config file")
    .option(
      "-s, --settings-dir <dir>",
      "Directory for the stored settings",
      DEFAULT_SETTINGS_DIR
    )
    .action((options: InitOptions) => {
      try {
        initCommand(options);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(message);
        process.exit(1);
      }
    });

  return command;
}

function initCommand(options: InitOptions): void {
  const configPath = path.join(process.cwd(), "cfi.config.ts");

  if (fs.existsSync(configPath) && !options.force) {
    logger.warn(`${chalk.cyan("cfi.config.ts")} already exists. Use --force to overwrite.`);
    return;
  }

  fs.writeFileSync(configPath, generateExampleConfig(options.settingsDir), "utf-8");
  logger.success(`Created ${chalk.cyan("cfi.config.ts")}`);

  if (ensureSettingsDirInGitignore(options.settingsDir)) {
    logger.success(`Added ${chalk.cyan(`${options.settingsDir}/`)} to .gitignore`);
  }

  console.log();
  logger.info("Next steps:");
  console.log(chalk.gray("  1. Set CFI_AUTH_KEY (or CFI_SALT) in your environment or .env"));
  console.log(chalk.gray("  2. Run `cfi configure --interactive`"));
  console.log(chalk.gray("  3. Run `cfi invalidate --all`"));
  console.log();
}
