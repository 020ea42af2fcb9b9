import type { Dirent } from "node:fs";
import { readdir, realpath } from "node:fs/promises";
import path from "node:path";

import { silentLogger, type Logger } from "../utils/logger.js";

export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = ["node_modules", "vendor", ".git"];

const GIT_DIR = ".git";

export interface DiscoveryOptions {
  maxDepth: number;
  excludedDirectories?: readonly string[];
  logger?: Logger;
}

export interface DiscoveryResult {
  repositories: string[];
  scannedDirectories: number;
  errors: Array<{ path: string; error: string }>;
}

const byName = (left: Dirent, right: Dirent): number =>
  left.name < right.name ? -1 : left.name > right.name ? 1 : 0;

/**
 * Depth-first walk from `root` collecting directories that hold a `.git` directory.
 * The root is depth 0. Repositories and excluded directories are not descended into,
 * and neither is anything deeper than `maxDepth`.
 */
export const discoverRepositories = async (
  root: string,
  options: DiscoveryOptions
): Promise<DiscoveryResult> => {
  const logger = options.logger ?? silentLogger;
  const excluded = new Set([...DEFAULT_EXCLUDED_DIRECTORIES, ...(options.excludedDirectories ?? [])]);
  const seen = new Set<string>();
  const result: DiscoveryResult = {
    repositories: [],
    scannedDirectories: 0,
    errors: []
  };

  const register = async (repoPath: string): Promise<void> => {
    let key = repoPath;
    try {
      key = await realpath(repoPath);
    } catch (error) {
      logger.debug("Cannot resolve real path, using walk path", {
        path: repoPath,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    if (seen.has(key)) {
      return;
    }

    seen.add(key);
    result.repositories.push(repoPath);
    logger.info("Found repository", { path: repoPath });
  };

  const visit = async (directory: string, depth: number): Promise<void> => {
    result.scannedDirectories += 1;

    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.errors.push({ path: directory, error: message });
      logger.warn("Cannot access directory", { path: directory, error: message });
      return;
    }

    if (entries.some((entry) => entry.name === GIT_DIR && entry.isDirectory())) {
      await register(directory);
      return;
    }

    if (depth >= options.maxDepth) {
      return;
    }

    for (const entry of [...entries].sort(byName)) {
      if (!entry.isDirectory() || excluded.has(entry.name)) {
        continue;
      }

      await visit(path.join(directory, entry.name), depth + 1);
    }
  };

  await visit(path.resolve(root), 0);

  return result;
};
