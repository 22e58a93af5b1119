// CHANGE: Persist fetched documents keyed by (repository, resolved commit, path).
// WHY: Content at a fixed commit never changes, so one download per commit is enough across runs.

import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { CACHE } from "./config.js";
import { CacheWriteError, describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import { CacheEntry } from "./types.js";

/**
 * Key-value store behind the fetch cache.
 *
 * `write` fails with `CacheWriteError` when the backing storage is unwritable.
 */
export interface CacheStore {
  read(key: string): Promise<CacheEntry | undefined>;
  write(key: string, entry: CacheEntry): Promise<void>;
}

/**
 * Store kept in process memory only. Used by tests and as the degraded mode.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async read(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, entry);
  }

  get size(): number {
    return this.entries.size;
  }
}

const CacheRecordSchema = z.object({
  version: z.number(),
  repository: z.string(),
  path: z.string(),
  resolvedCommit: z.string(),
  fetchedAt: z.string(),
  content: z.string()
});

type CacheRecord = z.infer<typeof CacheRecordSchema>;

/**
 * Directory of `<key>.json` records, each holding base64 content and fetch metadata.
 *
 * The directory is created lazily on the first write. Records are written to a
 * temporary file and renamed into place so concurrent writers of distinct keys
 * never observe a partial file.
 */
export class DiskCacheStore implements CacheStore {
  constructor(readonly directory: string = CACHE.DIR) {}

  private recordPath(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }

  /**
   * Load a record from disk.
   *
   * @param key - Cache key.
   * @returns Entry, or undefined when absent, corrupt or from another cache version.
   */
  async read(key: string): Promise<CacheEntry | undefined> {
    const file = this.recordPath(key);
    if (!(await fs.pathExists(file))) {
      return undefined;
    }
    let parsed: CacheRecord;
    try {
      const raw: unknown = await fs.readJson(file);
      parsed = CacheRecordSchema.parse(raw);
    } catch (error) {
      debug(`Cache record ${file} unreadable (${describeError(error)}), treating as miss.`);
      return undefined;
    }
    if (parsed.version !== CACHE.VERSION) {
      debug(`Cache record ${file} has version ${parsed.version}, treating as miss.`);
      return undefined;
    }
    return {
      repository: parsed.repository,
      path: parsed.path,
      resolvedCommit: parsed.resolvedCommit,
      fetchedAt: parsed.fetchedAt,
      content: Buffer.from(parsed.content, "base64")
    };
  }

  /**
   * Persist a record atomically by writing to temporary file before rename.
   *
   * @param key - Cache key.
   * @param entry - Entry to persist.
   * @throws CacheWriteError when the directory or file cannot be written.
   */
  async write(key: string, entry: CacheEntry): Promise<void> {
    const file = this.recordPath(key);
    const tempPath = `${file}.${process.pid}.${Date.now()}.tmp`;
    const record: CacheRecord = {
      version: CACHE.VERSION,
      repository: entry.repository,
      path: entry.path,
      resolvedCommit: entry.resolvedCommit,
      fetchedAt: entry.fetchedAt,
      content: entry.content.toString("base64")
    };
    try {
      await fs.ensureDir(this.directory);
      await fs.writeJson(tempPath, record, { spaces: 2 });
      await fs.move(tempPath, file, { overwrite: true });
    } catch (error) {
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        debug(`Could not remove ${tempPath}: ${describeError(cleanupError)}`);
      });
      throw new CacheWriteError(file, { cause: error });
    }
    debug(`Cached ${entry.repository}@${entry.resolvedCommit}:${entry.path} as ${key}`);
  }

  /**
   * Obtain simple statistics for CLI reporting.
   *
   * @returns Record count and total size on disk.
   */
  async stats(): Promise<{ readonly directory: string; readonly count: number; readonly bytes: number }> {
    if (!(await fs.pathExists(this.directory))) {
      return { directory: this.directory, count: 0, bytes: 0 };
    }
    const names = (await fs.readdir(this.directory)).filter(name => name.endsWith(".json"));
    let bytes = 0;
    for (const name of names) {
      const stat = await fs.stat(path.join(this.directory, name));
      bytes += stat.size;
    }
    return { directory: this.directory, count: names.length, bytes };
  }

  /**
   * Remove all records from the cache directory.
   */
  async clear(): Promise<void> {
    await fs.emptyDir(this.directory);
    info(`Cache directory ${this.directory} cleared.`);
  }
}
