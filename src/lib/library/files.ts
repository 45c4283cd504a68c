import { readdir, stat, unlink } from "node:fs/promises";
import path from "node:path";

import type { Config } from "@/lib/config";
import { isMissingFileError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { matchSidecarExtension } from "@/lib/sidecar/paths";
import type { RunContext } from "@/lib/library/run";

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

export type FileCheck = "present" | "missing" | "unreadable";

/**
 * Like `fileExists`, but reports a path that cannot be inspected (a
 * permission error, a symlink loop) as "unreadable" and logs it.
 */
export async function checkFile(filePath: string, logger: Logger): Promise<FileCheck> {
  try {
    return (await stat(filePath)).isFile() ? "present" : "missing";
  } catch (error) {
    if (isMissingFileError(error)) {
      return "missing";
    }
    logger.error(`Could not check ${filePath}`, error);
    return "unreadable";
  }
}

/**
 * Deletes a file, treating "already gone" as a logged no-op.
 * Returns whether this call removed it.
 */
export async function removeFile(
  filePath: string,
  logger: Logger,
): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      logger.warn(`File not found, moving on: ${filePath}`);
      return false;
    }
    throw error;
  }
}

/**
 * Recursively lists sidecar files under `root`, sorted. Directories whose
 * own name matches an excluded name (case-insensitive) are skipped along
 * with everything below them.
 */
export async function findSidecars(
  root: string,
  config: Pick<Config, "excludedDirectories" | "sidecarExtensions">,
  { logger, signal }: Pick<RunContext, "logger" | "signal">,
): Promise<string[]> {
  const files: string[] = [];
  const excluded = new Set(config.excludedDirectories);

  async function scan(currentDir: string) {
    signal?.throwIfAborted();
    const entries = await readdir(currentDir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);

      if (entry.isDirectory()) {
        if (excluded.has(entry.name.toLowerCase())) {
          logger.warn(`Skipping excluded directory ${fullPath}`);
          continue;
        }
        await scan(fullPath);
      } else if (
        entry.isFile() &&
        matchSidecarExtension(entry.name, config.sidecarExtensions)
      ) {
        files.push(fullPath);
      }
    }
  }

  await scan(root);
  return files.sort();
}
