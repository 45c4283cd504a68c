export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised when sidecars were read but none of them carried a usable
 * creation date, leaving nothing to build a library from.
 */
export class EmptyLibraryError extends Error {
  constructor(readonly discarded: number) {
    super(
      `All ${discarded} sidecar records had an invalid CreateDate; the library would be empty`,
    );
    this.name = "EmptyLibraryError";
  }
}

export function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }

  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
