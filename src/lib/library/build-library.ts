import { stat } from "node:fs/promises";

import { sortedUnique } from "@/lib/collections";
import type { Config } from "@/lib/config";
import { ConfigError, isMissingFileError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { readLibraryTable } from "@/lib/library/read-library";
import { createRunStats, type RunStats } from "@/lib/library/run";
import {
  explodeKeywords,
  type KeywordRow,
  type LibraryTable,
} from "@/lib/library/table";

export const NO_LENS = "No Lens";

export type Library = {
  table: LibraryTable;
  cameras: string[];
  lenses: string[];
  keywords: KeywordRow[];
  stats: RunStats;
};

export type BuildLibraryOptions = {
  logger?: Logger;
  /** Aborting rejects the build with the signal's reason. */
  signal?: AbortSignal;
};

async function assertLibraryRoot(basePath: string): Promise<void> {
  try {
    const info = await stat(basePath);
    if (!info.isDirectory()) {
      throw new ConfigError(`Library path is not a directory: ${basePath}`);
    }
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Library path does not exist: ${basePath}`);
    }
    throw error;
  }
}

function withDeadline(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined,
): { signal?: AbortSignal; dispose: () => void } {
  if (timeoutMs === undefined) {
    return { signal, dispose: () => {} };
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  const timer = setTimeout(() => {
    controller.abort(new Error(`Library build timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Builds the photo library from the sidecar tree: the normalized table,
 * sorted camera and lens names, and the long-format keyword table, plus
 * the run's diagnostics.
 *
 * This deletes files: superseded sidecar versions, phantom duplicates and
 * (when configured) dangling sidecars. Point it at a backed-up tree.
 */
export async function buildLibrary(
  config: Config,
  options: BuildLibraryOptions = {},
): Promise<Library> {
  const started = Date.now();
  const logger = options.logger ?? console;
  const stats = createRunStats();

  await assertLibraryRoot(config.basePath);

  const deadline = withDeadline(options.signal, config.timeoutMs);

  try {
    const table = await readLibraryTable(config, {
      logger,
      stats,
      signal: deadline.signal,
    });

    for (const row of table.rows) {
      if (row.lens.trim().length === 0) {
        row.lens = NO_LENS;
      }
    }

    const cameras = sortedUnique(table.rows.map((row) => row.camera));
    const lenses = sortedUnique(table.rows.map((row) => row.lens));
    const keywords = explodeKeywords(table.rows);

    stats.elapsedMs = Date.now() - started;
    logger.info(`It took ${Math.round(stats.elapsedMs / 1000)}s to get the data`);

    return { table, cameras, lenses, keywords, stats };
  } finally {
    deadline.dispose();
  }
}
