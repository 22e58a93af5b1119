// CHANGE: Confirm HTTP helpers retry on transient failures and stop on final answers.
// WHY: Retries are bounded and never spent on a missing reference.

import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { getBinary, getText, httpClient, isTransient } from "../src/utils/http.js";

const dummyConfig = {
  url: "https://example.com/data",
  headers: {}
} as InternalAxiosRequestConfig;

function failure(status: number): AxiosError {
  const error = new AxiosError(`status ${status}`);
  error.response = {
    status,
    statusText: "",
    headers: {},
    config: dummyConfig,
    data: null
  } satisfies AxiosResponse;
  return error;
}

describe("getText", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retries on 5xx responses", async () => {
    const success = {
      status: 200,
      statusText: "OK",
      headers: { "Content-Type": "text/plain" },
      config: dummyConfig,
      data: "ok"
    } satisfies AxiosResponse<string>;

    const spy = vi.spyOn(httpClient, "get");
    spy.mockRejectedValueOnce(failure(500));
    spy.mockResolvedValueOnce(success);

    const response = await getText("https://example.com/data");
    expect(response.data).toBe("ok");
    expect(response.status).toBe(200);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("does not retry a 404", async () => {
    const spy = vi.spyOn(httpClient, "get");
    spy.mockRejectedValueOnce(failure(404));

    await expect(getText("https://example.com/data")).rejects.toBeInstanceOf(AxiosError);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("getBinary", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the payload as a Buffer", async () => {
    const payload = new ArrayBuffer(3);
    new Uint8Array(payload).set([0x61, 0x62, 0x63]);
    vi.spyOn(httpClient, "get").mockResolvedValueOnce({
      status: 200,
      statusText: "OK",
      headers: {},
      config: dummyConfig,
      data: payload
    } satisfies AxiosResponse<ArrayBuffer>);

    const response = await getBinary("https://example.com/file");
    expect(response.data.toString()).toBe("abc");
  });
});

describe("isTransient", () => {
  it("classifies statuses and transport errors", () => {
    expect(isTransient(failure(429))).toBe(true);
    expect(isTransient(failure(502))).toBe(true);
    expect(isTransient(failure(403))).toBe(false);
    expect(isTransient(new AxiosError("timeout of 30000ms exceeded", "ECONNABORTED"))).toBe(true);
    expect(isTransient(new Error("not from axios"))).toBe(false);
  });
});
