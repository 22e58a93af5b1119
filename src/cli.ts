// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: The comparison pipeline must be callable with an injected fetch cache, without process-wide side effects.

import { Command } from "commander";
import fs from "fs-extra";
import { DiskCacheStore } from "./cache.js";
import { compareManifests } from "./comparator.js";
import { CACHE, MANIFEST, SOURCES, canastaPath } from "./config.js";
import { describeError } from "./errors.js";
import { FetchCache } from "./fetch-cache.js";
import { GitHubFetcher } from "./github.js";
import { parseManifest } from "./loader.js";
import { debug, error as logError, info, setLogLevel } from "./logger.js";
import { ComparisonReport, buildReport, summarize } from "./report.js";
import { renderReport } from "./render.js";
import { CacheEntry, GitRef, Manifest, refLabel } from "./types.js";

export interface CompareOptions {
  readonly taqastaBranch?: string;
  readonly canastaBranch?: string;
  readonly taqastaCommit?: string;
  readonly canastaCommit?: string;
  readonly mediawikiVersion?: string;
  readonly output?: string;
  readonly cacheDir?: string;
  readonly debug?: boolean;
}

interface LoadedSide {
  readonly ref: GitRef;
  readonly entry: CacheEntry;
  readonly manifest: Manifest;
}

/**
 * Pick the ref for one side; a commit takes precedence over a branch.
 *
 * @param commit - Commit hash from the command line, if any.
 * @param branch - Branch from the command line, if any.
 * @param defaultBranch - Branch used when neither is given.
 */
export function resolveGitReference(commit: string | undefined, branch: string | undefined, defaultBranch: string): GitRef {
  if (commit) {
    return { kind: "commit", sha: commit };
  }
  return { kind: "branch", name: branch || defaultBranch };
}

async function loadSide(
  cache: Pick<FetchCache, "fetchEntry">,
  label: string,
  repository: string,
  ref: GitRef,
  path: string
): Promise<LoadedSide> {
  const entry = await cache.fetchEntry(repository, ref, path);
  info(`Fetched ${label} ${path} at ${refLabel(ref)} (${entry.resolvedCommit}).`);
  const manifest = parseManifest(entry.content.toString("utf8"), {
    source: `${repository}@${refLabel(ref)}:${path}`,
    defaultBranch: MANIFEST.DEFAULT_BRANCH
  });
  return { ref, entry, manifest };
}

/**
 * Fetch both manifests, parse them and compare.
 *
 * With an explicit MediaWiki version both sides are fetched concurrently;
 * otherwise the Canasta file is chosen from the version found in Taqasta's document.
 *
 * @param options - Ref selection.
 * @param cache - Fetch cache serving both sides.
 * @returns Report ready for rendering.
 */
export async function runComparison(
  options: CompareOptions,
  cache: Pick<FetchCache, "fetchEntry">
): Promise<ComparisonReport> {
  const taqastaRef = resolveGitReference(options.taqastaCommit, options.taqastaBranch, SOURCES.TAQASTA.DEFAULT_BRANCH);
  const canastaRef = resolveGitReference(options.canastaCommit, options.canastaBranch, SOURCES.CANASTA.DEFAULT_BRANCH);

  const loadTaqasta = () =>
    loadSide(cache, SOURCES.TAQASTA.LABEL, SOURCES.TAQASTA.REPOSITORY, taqastaRef, SOURCES.TAQASTA.PATH);
  const loadCanasta = (version: string) =>
    loadSide(cache, SOURCES.CANASTA.LABEL, SOURCES.CANASTA.REPOSITORY, canastaRef, canastaPath(version));

  let taqasta: LoadedSide;
  let canasta: LoadedSide;
  let mediaWikiVersion: string;
  if (options.mediawikiVersion) {
    mediaWikiVersion = options.mediawikiVersion;
    [taqasta, canasta] = await Promise.all([loadTaqasta(), loadCanasta(mediaWikiVersion)]);
  } else {
    // CHANGE: Fetch Taqasta first when no version is given.
    // WHY: The Canasta file name depends on the release Taqasta targets.
    taqasta = await loadTaqasta();
    mediaWikiVersion = taqasta.manifest.mediaWikiVersion ?? SOURCES.DEFAULT_MEDIAWIKI_VERSION;
    debug(`Using MediaWiki version ${mediaWikiVersion} to select the Canasta file.`);
    canasta = await loadCanasta(mediaWikiVersion);
  }

  const result = compareManifests(taqasta.manifest, canasta.manifest);
  const summary = summarize(result);
  info(
    `Compared: extensions +${summary.extensions.onlyInA}/-${summary.extensions.onlyInB}/~${summary.extensions.differing}, ` +
      `skins +${summary.skins.onlyInA}/-${summary.skins.onlyInB}/~${summary.skins.differing}`
  );
  return buildReport(
    result,
    { name: SOURCES.TAQASTA.LABEL, ref: refLabel(taqasta.ref), resolvedCommit: taqasta.entry.resolvedCommit },
    { name: SOURCES.CANASTA.LABEL, ref: refLabel(canasta.ref), resolvedCommit: canasta.entry.resolvedCommit },
    mediaWikiVersion
  );
}

/**
 * Compare mode entry point: fetch, compare and print or save the report.
 */
export async function compareAction(options: CompareOptions): Promise<void> {
  if (options.debug) {
    setLogLevel("debug");
  }
  const store = new DiskCacheStore(options.cacheDir ?? CACHE.DIR);
  const cache = new FetchCache(new GitHubFetcher(), store);
  const report = await runComparison(options, cache);
  const text = renderReport(report);
  if (options.output) {
    await fs.outputFile(options.output, `${text}\n`, "utf8");
    info(`Diff saved to ${options.output}`);
    return;
  }
  console.log(text);
}

/**
 * State mode entry point: print cache statistics.
 */
export async function cacheStateAction(options: { readonly cacheDir?: string }): Promise<void> {
  const store = new DiskCacheStore(options.cacheDir ?? CACHE.DIR);
  console.log(await store.stats());
}

/**
 * Reset mode entry point: clear cache directory.
 */
export async function cacheResetAction(options: { readonly cacheDir?: string }): Promise<void> {
  const store = new DiskCacheStore(options.cacheDir ?? CACHE.DIR);
  await store.clear();
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("mw-manifest-diff")
    .description("Compare Taqasta values.yml with Canasta recommended revisions")
    .version("1.0.0");

  program
    .command("compare", { isDefault: true })
    .description("Fetch both manifests and print their differences")
    .option("--taqasta-branch <name>", "Taqasta branch to compare", SOURCES.TAQASTA.DEFAULT_BRANCH)
    .option("--canasta-branch <name>", "Canasta branch to compare", SOURCES.CANASTA.DEFAULT_BRANCH)
    .option("--taqasta-commit <sha>", "Taqasta commit to compare (overrides --taqasta-branch)")
    .option("--canasta-commit <sha>", "Canasta commit to compare (overrides --canasta-branch)")
    .option("--mediawiki-version <version>", "MediaWiki version selecting the Canasta file (default: detected)")
    .option("--output <file>", "Write the diff to a file instead of stdout")
    .option("--cache-dir <dir>", "Directory for cached documents", CACHE.DIR)
    .option("--debug", "Enable debug logging")
    .action(async (options: CompareOptions) => compareAction(options));

  const cacheCommand = program.command("cache").description("Fetch cache operations");
  cacheCommand
    .command("state")
    .description("Display cache statistics")
    .option("--cache-dir <dir>", "Directory for cached documents", CACHE.DIR)
    .action(async (options: { readonly cacheDir?: string }) => cacheStateAction(options));
  cacheCommand
    .command("reset")
    .description("Remove every cached document")
    .option("--cache-dir <dir>", "Directory for cached documents", CACHE.DIR)
    .action(async (options: { readonly cacheDir?: string }) => cacheResetAction(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trimEnd())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`Failed to compare manifests: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
