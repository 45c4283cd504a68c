import { readFile } from "node:fs/promises";
import path from "node:path";

import type { Config } from "@/lib/config";
import { checkFile, removeFile } from "@/lib/library/files";
import type { RunContext } from "@/lib/library/run";
import {
  extractRecord,
  readDescription,
  type DescriptionLookup,
  type SidecarRecord,
} from "@/lib/sidecar/parser";
import { photoPathForSidecar } from "@/lib/sidecar/paths";

/**
 * Reads one sidecar with the primary mapping, falling back to the
 * alternative mappings when the creation date is missing. Returns null
 * for sidecars that could not be loaded (or were deleted as dangling);
 * the reason is counted in `stats` and logged.
 */
export async function readSidecar(
  filePath: string,
  config: Config,
  context: RunContext,
): Promise<SidecarRecord | null> {
  const { logger, stats } = context;

  let xml: string;
  try {
    xml = await readFile(filePath, "utf8");
  } catch (error) {
    stats.unloaded += 1;
    logger.error(`Could not read sidecar ${filePath}`, error);
    return null;
  }

  const [primary] = config.schemaVariants;
  const lookup = readDescription(xml);

  if (!lookup.ok) {
    return recoverSidecar(filePath, lookup, lookup.missingKey, config, context);
  }

  const result = extractRecord(
    primary,
    lookup.description,
    path.basename(filePath),
    config,
  );

  if (result.ok) {
    return result.record;
  }

  return recoverSidecar(filePath, lookup, result.missingKey, config, context);
}

async function recoverSidecar(
  filePath: string,
  lookup: DescriptionLookup,
  missingKey: string,
  config: Config,
  { logger, stats }: RunContext,
): Promise<SidecarRecord | null> {
  const photoPath = photoPathForSidecar(filePath, config.sidecarExtensions);
  const photo = await checkFile(photoPath, logger);

  if (photo === "unreadable") {
    stats.unloaded += 1;
    logger.warn(`Could not read data from sidecar: ${filePath}`);
    return null;
  }

  if (photo === "missing") {
    logger.warn(`Sidecar has no matching image: ${filePath}`);
    stats.dangling += 1;

    if (config.deleteDanglingSidecars) {
      logger.warn(`Deleting dangling sidecar ${filePath}`);
      await removeFile(filePath, logger);
      return null;
    }
  }

  const [primary, ...fallbacks] = config.schemaVariants;

  if (lookup.ok && missingKey === primary.fields.createDate) {
    for (const variant of fallbacks) {
      const result = extractRecord(
        variant,
        lookup.description,
        path.basename(filePath),
        config,
      );

      if (result.ok) {
        logger.debug(`Read ${filePath} with the ${variant.name} mapping`);
        return result.record;
      }

      logger.warn(`Missing key: ${result.missingKey}`);
    }
  }

  stats.unloaded += 1;
  logger.warn(`Missing key: ${missingKey}`);
  logger.warn(`Could not read data from sidecar: ${filePath}`);

  return null;
}
