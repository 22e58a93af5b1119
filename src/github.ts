// CHANGE: Implement the remote fetcher against GitHub's commits API and raw content host.
// WHY: The fetch cache needs branch resolution and commit-addressed downloads with a typed failure taxonomy.

import { AxiosError, RawAxiosRequestHeaders } from "axios";
import { NET } from "./config.js";
import { NetworkUnavailableError, ReferenceNotFoundError, describeError } from "./errors.js";
import { debug } from "./logger.js";
import { getBinary, getText } from "./utils/http.js";

/**
 * Collaborator consumed by the fetch cache.
 *
 * Both operations fail with `NetworkUnavailableError` or `ReferenceNotFoundError`.
 */
export interface RemoteFetcher {
  resolveBranchToCommit(repository: string, branch: string): Promise<string>;
  fetchRawContent(repository: string, commit: string, path: string): Promise<Buffer>;
}

const SHA_PATTERN = /^[0-9a-f]{40}$/i;

function authHeaders(): RawAxiosRequestHeaders {
  return NET.GITHUB_TOKEN ? { Authorization: `Bearer ${NET.GITHUB_TOKEN}` } : {};
}

function encodePath(path: string): string {
  return path
    .split("/")
    .map(segment => encodeURIComponent(segment))
    .join("/");
}

/**
 * Translate a failed request into the pipeline's error taxonomy.
 *
 * @param error - Error raised by the HTTP layer after retries.
 * @param repository - Repository being fetched.
 * @param ref - Branch, commit or `commit:path` being fetched.
 */
export function toFetchError(error: unknown, repository: string, ref: string): Error {
  if (error instanceof AxiosError) {
    const status = error.response?.status;
    if (status === 404 || status === 422) {
      return new ReferenceNotFoundError(repository, ref, { cause: error });
    }
    const detail = typeof status === "number" ? `HTTP ${status}` : error.code ?? error.message;
    return new NetworkUnavailableError(repository, ref, detail, { cause: error });
  }
  return new NetworkUnavailableError(repository, ref, describeError(error), { cause: error });
}

/**
 * GitHub-backed fetcher.
 */
export class GitHubFetcher implements RemoteFetcher {
  constructor(
    private readonly apiUrl: string = NET.GITHUB_API_URL,
    private readonly rawUrl: string = NET.GITHUB_RAW_URL
  ) {}

  /**
   * Resolve a branch to the commit at its tip.
   *
   * @param repository - Repository in owner/name form.
   * @param branch - Branch name.
   * @returns 40-character commit hash.
   */
  async resolveBranchToCommit(repository: string, branch: string): Promise<string> {
    const url = `${this.apiUrl}/repos/${repository}/commits/${encodeURIComponent(branch)}`;
    let body: string;
    try {
      const response = await getText(url, { ...authHeaders(), Accept: "application/vnd.github.sha" });
      body = response.data.trim();
    } catch (error) {
      throw toFetchError(error, repository, branch);
    }
    if (!SHA_PATTERN.test(body)) {
      throw new NetworkUnavailableError(repository, branch, "unexpected response to branch lookup");
    }
    debug(`Resolved ${repository}@${branch} to ${body}`);
    return body;
  }

  /**
   * Download a file at a fixed commit.
   *
   * @param repository - Repository in owner/name form.
   * @param commit - Commit hash.
   * @param path - Repository-relative file path.
   * @returns Raw file bytes.
   */
  async fetchRawContent(repository: string, commit: string, path: string): Promise<Buffer> {
    const url = `${this.rawUrl}/${repository}/${commit}/${encodePath(path)}`;
    try {
      const response = await getBinary(url, authHeaders());
      debug(`Downloaded ${url} (${response.data.byteLength} bytes, status ${response.status})`);
      return response.data;
    } catch (error) {
      throw toFetchError(error, repository, `${commit}:${path}`);
    }
  }
}
