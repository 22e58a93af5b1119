// CHANGE: Provide SHA-256 hashing utility for cache addressing.
// WHY: Disk cache file names must be stable for one (repository, commit, path) triple.

import { createHash } from "crypto";

/**
 * Compute SHA-256 hash of provided buffer or string.
 *
 * @param input - Content to hash.
 * @returns Hexadecimal SHA-256 digest.
 */
export function sha256(input: Buffer | string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Derive the cache key for a document at a resolved commit.
 *
 * @param repository - Repository in owner/name form.
 * @param resolvedCommit - Concrete commit hash.
 * @param path - Repository-relative file path.
 * @returns Hex digest used as the store key.
 */
export function cacheKey(repository: string, resolvedCommit: string, path: string): string {
  return sha256(`${repository}\n${resolvedCommit}\n${path}`);
}
