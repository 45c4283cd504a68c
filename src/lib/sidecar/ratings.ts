import { copyFile, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigError, isMissingFileError } from "@/lib/errors";
import { fileExists } from "@/lib/library/files";
import type { Logger } from "@/lib/logger";
import { readDescription } from "@/lib/sidecar/parser";

export const SIDECAR_SUBDIRECTORY = path.join("Exposure Software", "Exposure X7");

const ratingSchema = z.number().int().min(0).max(5);

export function validateRating(rating: number): number {
  const parsed = ratingSchema.safeParse(rating);
  if (!parsed.success) {
    throw new ConfigError(`Rating must be between 0 and 5 (got: ${rating})`);
  }

  return parsed.data;
}

function jpegCaseVariants(name: string): string[] {
  return [
    name.replace(".jpg", ".JPG"),
    name.replace(".jpeg", ".JPEG"),
    name.replace(".JPG", ".jpg"),
    name.replace(".JPEG", ".jpeg"),
  ];
}

/**
 * Sidecar file names to try for a photo, most likely first: the full
 * photo name, then its stem, for each extension in preference order,
 * then the same names with the JPEG extension's case flipped.
 */
export function sidecarCandidates(
  photoName: string,
  extensions: readonly string[],
): string[] {
  const stem = path.parse(photoName).name;
  const names = [
    ...extensions.map((extension) => `${photoName}.${extension}`),
    ...extensions.map((extension) => `${stem}.${extension}`),
  ];

  return [...new Set([...names, ...names.flatMap(jpegCaseVariants)])];
}

export async function findSidecarFile(
  photoName: string,
  sidecarDir: string,
  extensions: readonly string[],
): Promise<string | null> {
  for (const candidate of sidecarCandidates(photoName, extensions)) {
    const sidecarPath = path.join(sidecarDir, candidate);
    if (await fileExists(sidecarPath)) {
      return sidecarPath;
    }
  }

  return null;
}

export type RatingUpdate =
  | { updated: true; previous: string; xml: string }
  | { updated: false; reason: string };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Rewrites every `*Rating` attribute on the sidecar's description to
 * `rating`. The rest of the document is left byte for byte as it was.
 */
export function updateRatingInXml(xml: string, rating: number): RatingUpdate {
  const lookup = readDescription(xml);
  if (!lookup.ok) {
    return { updated: false, reason: `No ${lookup.missingKey} element found` };
  }

  const attributes = Object.entries(lookup.description).filter(
    ([key, value]) =>
      key.startsWith("@") && key.includes("Rating") && typeof value === "string",
  );

  if (attributes.length === 0) {
    return { updated: false, reason: "No Rating attribute found" };
  }

  let updated = xml;
  for (const [key] of attributes) {
    const pattern = new RegExp(`(${escapeRegExp(key.slice(1))}\\s*=\\s*")[^"]*(")`, "g");
    updated = updated.replace(
      pattern,
      (_match, open: string, close: string) => `${open}${rating}${close}`,
    );
  }

  if (updated === xml) {
    return { updated: false, reason: "No changes made to content" };
  }

  return { updated: true, previous: String(attributes[0][1]), xml: updated };
}

export type RatingSummary = {
  updated: number;
  skipped: number;
  errors: number;
  total: number;
};

export type SetRatingsOptions = {
  extensions?: readonly string[];
  logger?: Logger;
};

async function assertDirectory(dir: string): Promise<void> {
  try {
    if ((await stat(dir)).isDirectory()) {
      return;
    }
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
  }

  throw new ConfigError(`Sidecar directory not found: ${dir}`);
}

/**
 * Sets the rating of each photo's sidecar under
 * `<rootDir>/Exposure Software/Exposure X7`, copying the sidecar into
 * `backup/` next to it before writing.
 */
export async function setRatings(
  photos: readonly string[],
  rootDir: string,
  rating: number,
  options: SetRatingsOptions = {},
): Promise<RatingSummary> {
  const value = validateRating(rating);
  const logger = options.logger ?? console;
  const extensions = options.extensions ?? ["exposurex7", "exposurex6"];
  const sidecarDir = path.join(rootDir, SIDECAR_SUBDIRECTORY);
  const backupDir = path.join(sidecarDir, "backup");

  await assertDirectory(sidecarDir);
  await mkdir(backupDir, { recursive: true });
  logger.info(`Backup directory: ${backupDir}`);

  const summary: RatingSummary = {
    updated: 0,
    skipped: 0,
    errors: 0,
    total: photos.length,
  };

  for (const photoName of photos) {
    const sidecarPath = await findSidecarFile(photoName, sidecarDir, extensions);

    if (!sidecarPath) {
      logger.warn(`Skipped: ${photoName} (no sidecar found)`);
      summary.skipped += 1;
      continue;
    }

    try {
      await copyFile(sidecarPath, path.join(backupDir, path.basename(sidecarPath)));

      const result = updateRatingInXml(await readFile(sidecarPath, "utf8"), value);
      if (!result.updated) {
        logger.warn(`Warning: ${photoName} (${result.reason})`);
        summary.skipped += 1;
        continue;
      }

      await writeFile(sidecarPath, result.xml, "utf8");
      logger.info(`Updated: ${photoName} (rating: ${result.previous} -> ${value})`);
      summary.updated += 1;
    } catch (error) {
      logger.error(`Error processing ${photoName}`, error);
      summary.errors += 1;
    }
  }

  return summary;
}
