/**
 * Gitignore utility
 * Keeps the settings directory (encrypted credentials) out of version control
 */

import { existsSync, readFileSync, appendFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";

const GITIGNORE_COMMENT = "# cfi settings (encrypted CloudFront credentials)";

/**
 * Strip leading and trailing slashes from a directory name
 */
function normalizeDir(dir: string): string {
  return dir.replace(/^\/+|\/+$/g, "");
}

/**
 * Check if .gitignore contains an entry for the directory
 */
export function hasGitignoreEntry(gitignorePath: string, dir: string): boolean {
  if (!existsSync(gitignorePath)) {
    return false;
  }

  const target = normalizeDir(dir);
  const lines = readFileSync(gitignorePath, "utf-8").split("\n");

  return lines.some((line) => normalizeDir(line.trim()) === target);
}

/**
 * Ensure the settings directory is in .gitignore
 *
 * @param settingsDir - Settings directory name
 * @param cwd - Current working directory
 * @returns true if .gitignore was created or modified
 */
export function ensureSettingsDirInGitignore(
  settingsDir: string,
  cwd: string = process.cwd()
): boolean {
  const gitignorePath = join(cwd, ".gitignore");

  // Skip if not a git repository
  if (!existsSync(join(cwd, ".git"))) {
    return false;
  }

  const entry = `${normalizeDir(settingsDir)}/`;

  if (!existsSync(gitignorePath)) {
    writeFileSync(gitignorePath, `${GITIGNORE_COMMENT}\n${entry}\n`, "utf-8");
    return true;
  }

  if (hasGitignoreEntry(gitignorePath, settingsDir)) {
    return false;
  }

  appendFileSync(gitignorePath, `\n${GITIGNORE_COMMENT}\n${entry}\n`, "utf-8");
  return true;
}
