// CHANGE: Resolve refs and serve document bytes through a commit-addressed cache.
// WHY: Branch tips move, commit content does not: resolve on every call, download once per commit.

import { CacheStore } from "./cache.js";
import { CacheWriteError, describeError } from "./errors.js";
import { RemoteFetcher } from "./github.js";
import { debug, warn } from "./logger.js";
import { CacheEntry, GitRef, refLabel } from "./types.js";
import { cacheKey } from "./utils/hashing.js";

export interface FetchCacheOptions {
  readonly now?: () => Date;
}

/**
 * Fetch layer feeding the document loader.
 *
 * Lookup order is process memory, then the store, then the network. Concurrent
 * requests for the same uncached key share one pending download.
 */
export class FetchCache {
  private readonly memory = new Map<string, CacheEntry>();
  private readonly pending = new Map<string, Promise<CacheEntry>>();
  private persistent = true;
  private readonly now: () => Date;

  constructor(
    private readonly fetcher: RemoteFetcher,
    private readonly store: CacheStore,
    options: FetchCacheOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Whether the backing store is still in use. Turns false after the first
   * failed write.
   */
  get isPersistent(): boolean {
    return this.persistent;
  }

  /**
   * Return the bytes of `path` in `repository` at `ref`.
   *
   * @param repository - Repository in owner/name form.
   * @param ref - Branch or commit.
   * @param path - Repository-relative file path.
   */
  async fetch(repository: string, ref: GitRef, path: string): Promise<Buffer> {
    const entry = await this.fetchEntry(repository, ref, path);
    return entry.content;
  }

  /**
   * Same as `fetch` but returns the full cache entry, including the resolved commit.
   */
  async fetchEntry(repository: string, ref: GitRef, path: string): Promise<CacheEntry> {
    const resolvedCommit = await this.resolve(repository, ref);
    const key = cacheKey(repository, resolvedCommit, path);

    const inFlight = this.pending.get(key);
    if (inFlight) {
      debug(`Joining in-flight fetch for ${repository}@${resolvedCommit}:${path}`);
      return inFlight;
    }

    // CHANGE: Register the download before awaiting it.
    // WHY: A second caller for the same key must see the pending task, not start another fetch.
    const task = this.load(key, repository, resolvedCommit, path).finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, task);
    return task;
  }

  private async resolve(repository: string, ref: GitRef): Promise<string> {
    if (ref.kind === "commit") {
      return ref.sha;
    }
    debug(`Resolving branch ${repository}@${refLabel(ref)}`);
    return this.fetcher.resolveBranchToCommit(repository, ref.name);
  }

  private async load(key: string, repository: string, resolvedCommit: string, path: string): Promise<CacheEntry> {
    const cached = this.memory.get(key) ?? (await this.readStore(key));
    if (cached) {
      debug(`Cache hit for ${repository}@${resolvedCommit}:${path}`);
      this.memory.set(key, cached);
      return cached;
    }

    debug(`Cache miss for ${repository}@${resolvedCommit}:${path}`);
    const content = await this.fetcher.fetchRawContent(repository, resolvedCommit, path);
    const entry: CacheEntry = {
      repository,
      path,
      resolvedCommit,
      fetchedAt: this.now().toISOString(),
      content
    };
    this.memory.set(key, entry);
    await this.writeStore(key, entry);
    return entry;
  }

  private async readStore(key: string): Promise<CacheEntry | undefined> {
    if (!this.persistent) {
      return undefined;
    }
    return this.store.read(key);
  }

  private async writeStore(key: string, entry: CacheEntry): Promise<void> {
    if (!this.persistent) {
      return;
    }
    try {
      await this.store.write(key, entry);
    } catch (error) {
      if (!(error instanceof CacheWriteError)) {
        throw error;
      }
      // CHANGE: Drop to memory-only caching after the first failed write.
      // WHY: The comparison still completes; later writes would fail the same way.
      this.persistent = false;
      warn(`${error.message} (${describeError(error.cause)}); continuing with in-memory cache only.`);
    }
  }
}
