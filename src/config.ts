// CHANGE: Centralise configuration source with environment validation.
// WHY: Remote locations, retry policy and cache location must be overridable per run.

import * as dotenv from "dotenv";
import os from "os";
import path from "path";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Upstream repositories holding the two manifests under comparison.
 *
 * Side A is Taqasta's `values.yml`; side B is Canasta's recommended revisions,
 * one file per MediaWiki version.
 */
export const SOURCES = {
  TAQASTA: {
    LABEL: "Taqasta",
    REPOSITORY: "WikiTeq/Taqasta",
    PATH: "values.yml",
    DEFAULT_BRANCH: "master"
  },
  CANASTA: {
    LABEL: "Canasta",
    REPOSITORY: "CanastaWiki/RecommendedRevisions",
    DEFAULT_BRANCH: "main"
  },
  DEFAULT_MEDIAWIKI_VERSION: "1.43"
} as const;

/**
 * Canasta keeps one revisions file per MediaWiki release.
 *
 * @param mediaWikiVersion - Version in `major.minor` form.
 * @returns Repository-relative path of the revisions file.
 */
export function canastaPath(mediaWikiVersion: string): string {
  return `${mediaWikiVersion}.yaml`;
}

/**
 * Normalisation defaults applied by the document loader.
 */
export const MANIFEST = {
  DEFAULT_BRANCH: "REL1_43",
  COMPOSER_UPDATE_STEP: "composer update"
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `RETRIES` and `CONCURRENCY` are positive.
 */
export const NET = {
  TIMEOUT: intFromEnv("HTTP_TIMEOUT", 30000),
  RETRIES: intFromEnv("HTTP_RETRIES", 3),
  RETRY_BASE_DELAY_MS: 500,
  CONCURRENCY: intFromEnv("HTTP_CONCURRENCY", 4),
  GITHUB_TOKEN: process.env.GITHUB_TOKEN ?? "",
  GITHUB_API_URL: process.env.GITHUB_API_URL ?? "https://api.github.com",
  GITHUB_RAW_URL: process.env.GITHUB_RAW_URL ?? "https://raw.githubusercontent.com"
} as const;

/**
 * On-disk fetch cache settings.
 */
export const CACHE = {
  DIR: process.env.MW_DIFF_CACHE_DIR ?? path.join(os.homedir(), ".cache", "mw-manifest-diff"),
  VERSION: 1
} as const;
