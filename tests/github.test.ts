// CHANGE: Validate GitHub URL construction and mapping of HTTP failures to the error taxonomy.
// WHY: Callers retry NetworkUnavailableError and abort on ReferenceNotFoundError.

import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { NetworkUnavailableError, ReferenceNotFoundError } from "../src/errors.js";
import { GitHubFetcher, toFetchError } from "../src/github.js";
import * as http from "../src/utils/http.js";

const SHA = "0123456789abcdef0123456789abcdef01234567";

function httpError(status: number): AxiosError {
  const config = { url: "https://example.test", headers: {} } as InternalAxiosRequestConfig;
  const error = new AxiosError(`status ${status}`);
  error.response = {
    status,
    statusText: "",
    headers: {},
    config,
    data: null
  } satisfies AxiosResponse;
  return error;
}

describe("GitHubFetcher", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves a branch through the commits API", async () => {
    const spy = vi.spyOn(http, "getText").mockResolvedValue({ data: `${SHA}\n`, status: 200 });
    const fetcher = new GitHubFetcher("https://api.example.test", "https://raw.example.test");

    await expect(fetcher.resolveBranchToCommit("WikiTeq/Taqasta", "feature/x")).resolves.toBe(SHA);
    expect(spy).toHaveBeenCalledWith(
      "https://api.example.test/repos/WikiTeq/Taqasta/commits/feature%2Fx",
      expect.objectContaining({ Accept: "application/vnd.github.sha" })
    );
  });

  it("rejects a branch lookup that does not return a sha", async () => {
    vi.spyOn(http, "getText").mockResolvedValue({ data: "<html>", status: 200 });
    const fetcher = new GitHubFetcher("https://api.example.test", "https://raw.example.test");

    await expect(fetcher.resolveBranchToCommit("WikiTeq/Taqasta", "master")).rejects.toBeInstanceOf(
      NetworkUnavailableError
    );
  });

  it("maps a missing branch to ReferenceNotFoundError", async () => {
    vi.spyOn(http, "getText").mockRejectedValue(httpError(422));
    const fetcher = new GitHubFetcher("https://api.example.test", "https://raw.example.test");

    await expect(fetcher.resolveBranchToCommit("WikiTeq/Taqasta", "nope")).rejects.toMatchObject({
      name: "ReferenceNotFoundError",
      repository: "WikiTeq/Taqasta",
      ref: "nope"
    });
  });

  it("downloads raw content at a commit", async () => {
    const spy = vi
      .spyOn(http, "getBinary")
      .mockResolvedValue({ data: Buffer.from("extensions: []\n"), status: 200 });
    const fetcher = new GitHubFetcher("https://api.example.test", "https://raw.example.test");

    const bytes = await fetcher.fetchRawContent("CanastaWiki/RecommendedRevisions", SHA, "1.43.yaml");

    expect(bytes.toString()).toBe("extensions: []\n");
    expect(spy).toHaveBeenCalledWith(
      `https://raw.example.test/CanastaWiki/RecommendedRevisions/${SHA}/1.43.yaml`,
      expect.any(Object)
    );
  });

  it("maps a missing file to ReferenceNotFoundError naming commit and path", async () => {
    vi.spyOn(http, "getBinary").mockRejectedValue(httpError(404));
    const fetcher = new GitHubFetcher("https://api.example.test", "https://raw.example.test");

    await expect(fetcher.fetchRawContent("CanastaWiki/RecommendedRevisions", SHA, "9.99.yaml")).rejects.toThrow(
      `Reference not found: CanastaWiki/RecommendedRevisions@${SHA}:9.99.yaml`
    );
  });
});

describe("toFetchError", () => {
  it("treats server errors and dropped connections as transient", () => {
    expect(toFetchError(httpError(503), "o/r", "main")).toBeInstanceOf(NetworkUnavailableError);
    const dropped = new AxiosError("socket hang up", "ECONNRESET");
    const mapped = toFetchError(dropped, "o/r", "main");
    expect(mapped).toBeInstanceOf(NetworkUnavailableError);
    expect(mapped.message).toBe("Network unavailable while fetching o/r@main: ECONNRESET");
  });

  it("treats 404 and 422 as missing references", () => {
    expect(toFetchError(httpError(404), "o/r", "main")).toBeInstanceOf(ReferenceNotFoundError);
    expect(toFetchError(httpError(422), "o/r", "main")).toBeInstanceOf(ReferenceNotFoundError);
  });

  it("wraps non-HTTP failures", () => {
    const mapped = toFetchError(new Error("offline"), "o/r", "main");
    expect(mapped).toBeInstanceOf(NetworkUnavailableError);
    expect(mapped.message).toBe("Network unavailable while fetching o/r@main: offline");
  });
});
