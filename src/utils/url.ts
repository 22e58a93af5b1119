// CHANGE: Provide repository URL normalisation shared by loader and comparator.
// WHY: `https://x/y.git`, `https://x/y/` and `https://x/y` name the same repository.

/**
 * Normalise a repository URL for equality checks.
 *
 * @param url - URL as written in the manifest.
 * @returns URL without surrounding whitespace, trailing slash or `.git` suffix.
 */
export function normalizeRepositoryUrl(url: string): string {
  let out = url.trim();
  if (out.endsWith("/")) {
    out = out.slice(0, -1);
  }
  if (out.endsWith(".git")) {
    out = out.slice(0, -4);
  }
  return out;
}
