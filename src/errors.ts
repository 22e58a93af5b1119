// CHANGE: Define the typed error taxonomy shared by loader, fetch cache and CLI.
// WHY: Callers branch on error class: retry network failures, abort on bad references and documents.

/**
 * Base class for every error raised by the comparison pipeline.
 */
export class ManifestDiffError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Input text is not valid YAML or does not have the manifest shape.
 */
export class MalformedDocumentError extends ManifestDiffError {
  constructor(
    message: string,
    public readonly category?: string,
    public readonly key?: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The same entry name appears twice within one category.
 */
export class DuplicateEntryError extends ManifestDiffError {
  constructor(
    public readonly category: string,
    public readonly entryName: string
  ) {
    super(`Duplicate entry "${entryName}" in ${category}`);
  }
}

/**
 * Transient network failure. Safe to retry.
 */
export class NetworkUnavailableError extends ManifestDiffError {
  constructor(
    public readonly repository: string,
    public readonly ref: string,
    detail: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Network unavailable while fetching ${repository}@${ref}: ${detail}`, options);
  }
}

/**
 * Repository, branch, commit or file does not exist upstream. Never retried.
 */
export class ReferenceNotFoundError extends ManifestDiffError {
  constructor(
    public readonly repository: string,
    public readonly ref: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Reference not found: ${repository}@${ref}`, options);
  }
}

/**
 * Local cache storage could not be written.
 */
export class CacheWriteError extends ManifestDiffError {
  constructor(
    public readonly location: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Cannot write cache entry at ${location}`, options);
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 *
 * @param value - Caught value.
 */
export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
