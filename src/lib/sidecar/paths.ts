import path from "node:path";

/** Longest configured extension the file name ends with, if any. */
export function matchSidecarExtension(
  fileName: string,
  extensions: readonly string[],
): string | undefined {
  let matched: string | undefined;

  for (const extension of extensions) {
    if (
      fileName.length > extension.length + 1 &&
      fileName.endsWith(extension) &&
      (!matched || extension.length > matched.length)
    ) {
      matched = extension;
    }
  }

  return matched;
}

/**
 * "photo.jpg.exposurex7" -> "photo.jpg": the matched extension and the one
 * separator character before it are removed. This is both the photo's name
 * and the key that groups sidecars of the same photo.
 */
export function sidecarPhotoName(
  fileName: string,
  extensions: readonly string[],
): string | undefined {
  const extension = matchSidecarExtension(fileName, extensions);
  if (!extension) {
    return undefined;
  }

  return fileName.slice(0, fileName.length - extension.length - 1);
}

/**
 * Sidecars live two directories below their photo:
 * `<dir>/Exposure Software/Exposure X7/photo.jpg.exposurex7` belongs to
 * `<dir>/photo.jpg`.
 */
export function photoPathForSidecar(
  sidecarPath: string,
  extensions: readonly string[],
): string {
  const fileName = path.basename(sidecarPath);
  const photoName =
    sidecarPhotoName(fileName, extensions) ??
    fileName.slice(0, fileName.length - path.extname(fileName).length);
  const photoDir = path.dirname(path.dirname(path.dirname(sidecarPath)));

  return path.join(photoDir, photoName);
}
