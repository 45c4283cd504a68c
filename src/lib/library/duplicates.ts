import path from "node:path";

import type { Config } from "@/lib/config";
import {
  matchSidecarExtension,
  photoPathForSidecar,
  sidecarPhotoName,
} from "@/lib/sidecar/paths";
import { checkFile, findSidecars, removeFile } from "@/lib/library/files";
import type { RunContext } from "@/lib/library/run";

export type SidecarCandidate = {
  path: string;
  /** Logical photo key: file name without its sidecar extension. */
  key: string;
  extension: string;
};

export type VersionCleanupPlan = {
  /** Keys shared by more than one sidecar, whatever their version. */
  duplicatedKeys: string[];
  /** Keys whose sidecars span more than one version. */
  versionGroups: string[];
  deletions: string[];
  /** Version groups with no current-version sidecar to keep. */
  unresolved: string[];
  /** Version groups left for a later pass by the per-pass limit. */
  deferred: number;
};

export function describeCandidates(
  files: readonly string[],
  extensions: readonly string[],
): SidecarCandidate[] {
  return files.flatMap((file) => {
    const fileName = path.basename(file);
    const extension = matchSidecarExtension(fileName, extensions);
    const key = sidecarPhotoName(fileName, extensions);

    return extension && key !== undefined ? [{ path: file, key, extension }] : [];
  });
}

export function groupByKey(
  candidates: readonly SidecarCandidate[],
): Map<string, SidecarCandidate[]> {
  const groups = new Map<string, SidecarCandidate[]>();

  for (const key of [...new Set(candidates.map((c) => c.key))].sort()) {
    groups.set(key, []);
  }

  for (const candidate of candidates) {
    groups.get(candidate.key)?.push(candidate);
  }

  return groups;
}

/**
 * Sidecars written by older editor versions sit next to the current one
 * under the same logical key. For at most `maxVersionGroupsPerRun` such
 * groups (in key order) every sidecar whose extension does not contain
 * `currentVersion` is scheduled for deletion. Groups without a
 * current-version sidecar are reported as unresolved and never count
 * against the limit.
 */
export function planVersionCleanup(
  candidates: readonly SidecarCandidate[],
  config: Pick<Config, "currentVersion" | "maxVersionGroupsPerRun">,
): VersionCleanupPlan {
  const current = config.currentVersion.toLowerCase();
  const groups = groupByKey(candidates);
  const isCurrent = (c: SidecarCandidate) =>
    c.extension.toLowerCase().includes(current);

  const duplicatedKeys = [...groups]
    .filter(([, group]) => group.length > 1)
    .map(([key]) => key);

  const versionGroups = duplicatedKeys.filter((key) => {
    const group = groups.get(key) ?? [];
    return new Set(group.map((c) => c.extension)).size > 1;
  });

  const unresolved = versionGroups.filter(
    (key) => !(groups.get(key) ?? []).some(isCurrent),
  );
  const resolvable = versionGroups.filter((key) => !unresolved.includes(key));
  const processed = resolvable.slice(0, config.maxVersionGroupsPerRun);

  const deletions = processed.flatMap((key) =>
    (groups.get(key) ?? []).filter((c) => !isCurrent(c)).map((c) => c.path),
  );

  return {
    duplicatedKeys,
    versionGroups,
    deletions,
    unresolved,
    deferred: resolvable.length - processed.length,
  };
}

/** Photo paths that decide whether duplicated sidecars are phantoms. */
export function phantomCheckPaths(
  candidates: readonly SidecarCandidate[],
  extensions: readonly string[],
): string[] {
  return [...groupByKey(candidates).values()]
    .filter((group) => group.length > 1)
    .flatMap((group) => group.map((c) => photoPathForSidecar(c.path, extensions)));
}

/**
 * Among sidecars sharing a logical key, those whose photo is not on disk
 * (usually left behind after the photo was copied elsewhere) are scheduled
 * for deletion.
 */
export function planPhantomCleanup(
  candidates: readonly SidecarCandidate[],
  existingPhotos: ReadonlySet<string>,
  extensions: readonly string[],
): string[] {
  return [...groupByKey(candidates).values()]
    .filter((group) => group.length > 1)
    .flatMap((group) =>
      group
        .filter(
          (c) => !existingPhotos.has(photoPathForSidecar(c.path, extensions)),
        )
        .map((c) => c.path),
    );
}

async function applyDeletions(
  paths: readonly string[],
  reason: string,
  { logger }: RunContext,
): Promise<number> {
  let removed = 0;

  // sequential: two deletions never target the same group at once
  for (const filePath of paths) {
    logger.warn(`Removing ${reason}: ${filePath}`);
    if (await removeFile(filePath, logger)) {
      removed += 1;
    }
  }

  return removed;
}

/**
 * Deletes superseded sidecar versions and phantom duplicates under
 * `root`, then returns the sidecar list as it is on disk afterwards.
 * Version groups are cleaned `maxVersionGroupsPerRun` at a time, walking
 * the tree again after each pass until none is left.
 */
export async function resolveDuplicates(
  root: string,
  files: readonly string[],
  config: Config,
  context: RunContext,
): Promise<string[]> {
  const { logger, stats } = context;
  const extensions = config.sidecarExtensions;
  let current = [...files];

  let versionPlan = planVersionCleanup(
    describeCandidates(current, extensions),
    config,
  );
  stats.duplicated = versionPlan.duplicatedKeys.length;
  logger.warn(`${versionPlan.duplicatedKeys.length} duplicated sidecars detected`);

  for (const key of versionPlan.unresolved) {
    logger.warn(
      `No ${config.currentVersion} sidecar to keep for ${key}, leaving its versions alone`,
    );
  }

  while (versionPlan.deletions.length > 0) {
    context.signal?.throwIfAborted();
    const removed = await applyDeletions(
      versionPlan.deletions,
      "duplicated sidecar from a previous version",
      context,
    );
    stats.versionDuplicatesRemoved += removed;
    current = await findSidecars(root, config, context);

    if (removed === 0) {
      break;
    }

    if (versionPlan.deferred > 0) {
      logger.warn(
        `${versionPlan.deferred} version-duplicate groups left, walking the library again`,
      );
    }
    versionPlan = planVersionCleanup(describeCandidates(current, extensions), config);
  }

  if (versionPlan.deferred > 0) {
    logger.warn(`${versionPlan.deferred} version-duplicate groups left untouched`);
  }

  const candidates = describeCandidates(current, extensions);
  const existingPhotos = new Set<string>();

  for (const photoPath of new Set(phantomCheckPaths(candidates, extensions))) {
    context.signal?.throwIfAborted();
    // only a photo known to be missing makes its sidecar a phantom
    if ((await checkFile(photoPath, logger)) !== "missing") {
      existingPhotos.add(photoPath);
    }
  }

  const phantoms = planPhantomCleanup(candidates, existingPhotos, extensions);

  if (phantoms.length > 0) {
    stats.phantomsRemoved += await applyDeletions(
      phantoms,
      "sidecar without associated image file",
      context,
    );
    current = await findSidecars(root, config, context);
  }

  return current;
}
