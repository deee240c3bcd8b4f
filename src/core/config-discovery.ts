import fs from "node:fs";
import path from "node:path";

// =============================================================================
// CONSTANTS
// =============================================================================

const REPO_CONFIG_DIR = ".git-conductor";
const REPO_CONFIG_FILE = "config.yaml";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "repo" | "defaults";

export type ConfigResolution =
  | { source: "explicit" | "repo"; configPath: string }
  | { source: "defaults"; configPath: null };

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(args: { explicitPath?: string; cwd?: string }): ConfigResolution {
  if (args.explicitPath) {
    return { source: "explicit", configPath: path.resolve(args.explicitPath) };
  }

  const repoRoot = findRepoRoot(args.cwd ?? process.cwd());
  if (repoRoot) {
    const repoConfig = repoConfigPath(repoRoot);
    if (fs.existsSync(repoConfig)) {
      return { source: "repo", configPath: repoConfig };
    }
  }

  return { source: "defaults", configPath: null };
}

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function repoConfigPath(repoRoot: string): string {
  return path.join(repoRoot, REPO_CONFIG_DIR, REPO_CONFIG_FILE);
}
