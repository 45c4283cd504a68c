import type { Config } from "@/lib/config";
import { chunk } from "@/lib/collections";
import type { SidecarRecord } from "@/lib/sidecar/parser";
import { readSidecar } from "@/lib/sidecar/reader";
import { resolveDuplicates } from "@/lib/library/duplicates";
import { findSidecars } from "@/lib/library/files";
import { normalizeRecords } from "@/lib/library/normalize";
import type { RunContext } from "@/lib/library/run";
import type { LibraryTable } from "@/lib/library/table";

export async function readSidecars(
  files: readonly string[],
  config: Config,
  context: RunContext,
): Promise<SidecarRecord[]> {
  const records: SidecarRecord[] = [];

  for (const batch of chunk(files, config.parseConcurrency)) {
    context.signal?.throwIfAborted();

    const results = await Promise.all(
      batch.map((file) => readSidecar(file, config, context)),
    );

    records.push(
      ...results.filter((record): record is SidecarRecord => record !== null),
    );
  }

  return records;
}

/**
 * Walks the sidecar tree under `config.basePath`, clears out duplicate
 * sidecars (when enabled), parses what is left and returns the normalized
 * table.
 */
export async function readLibraryTable(
  config: Config,
  context: RunContext,
): Promise<LibraryTable> {
  const { logger, stats } = context;

  let files = await findSidecars(config.basePath, config, context);
  if (config.runDuplicateScan) {
    files = await resolveDuplicates(config.basePath, files, config, context);
  }
  stats.sidecarsFound = files.length;

  const records = await readSidecars(files, config, context);
  stats.parsed = records.length;

  const table = normalizeRecords(records, config, context);

  logger.warn(`${table.rows.length} photos in library`);
  logger.warn(`${stats.dangling} dangling sidecar files found`);
  logger.warn(`${stats.unloaded} unloaded sidecar files found`);
  if (config.excludedDirectories.length > 0) {
    logger.warn(`${config.excludedDirectories.join(" and ")} dirs avoided`);
  }

  return table;
}
