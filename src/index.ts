#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: Allows importing the library surface without triggering command parsing.

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli, runComparison } from "./cli.js";
export { compareManifests } from "./comparator.js";
export { parseManifest, detectMediaWikiVersion } from "./loader.js";
export { FetchCache } from "./fetch-cache.js";
export { DiskCacheStore, MemoryCacheStore } from "./cache.js";
export type { CacheStore } from "./cache.js";
export { GitHubFetcher } from "./github.js";
export type { RemoteFetcher } from "./github.js";
export { buildReport, hasDifferences, summarize } from "./report.js";
export type { ComparisonReport, SideLabel } from "./report.js";
export { renderReport } from "./render.js";
export * from "./errors.js";
export * from "./types.js";
