/**
 * Unit tests for the single-attempt HTTP client
 *
 * fetch is stubbed; no network.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { httpRequest, HttpError } from "@/clients/http";

describe("httpRequest", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the status and text body of a 2xx response", async () => {
    const fetchMock = vi.fn(async () => new Response("<html>ok</html>", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const response = await httpRequest({
      method: "GET",
      url: "https://audio.test/abc",
      headers: { "User-Agent": "test-agent/1.0" },
      redirect: "manual",
    });

    expect(response).toEqual({
      status: 200,
      url: "https://audio.test/abc",
      body: "<html>ok</html>",
    });
    expect(fetchMock).toHaveBeenCalledWith(
      "https://audio.test/abc",
      expect.objectContaining({
        method: "GET",
        redirect: "manual",
        headers: expect.objectContaining({
          "User-Agent": "test-agent/1.0",
          Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
        }),
      }),
    );
  });

  it("should keep the real status of a non-200 success", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("cached copy", { status: 203 })));

    const response = await httpRequest({ method: "GET", url: "https://audio.test/abc" });

    expect(response.status).toBe(203);
    expect(response.body).toBe("cached copy");
  });

  it("should return an empty body for 204", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(null, { status: 204 })));

    const response = await httpRequest({ method: "GET", url: "https://audio.test/abc" });

    expect(response).toEqual({ status: 204, url: "https://audio.test/abc", body: "" });
  });

  it("should throw HttpError for a redirect left unfollowed", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(null, { status: 302, statusText: "Found", headers: { location: "/" } }),
      ),
    );

    const failure = await httpRequest({
      method: "GET",
      url: "https://audio.test/nope",
      redirect: "manual",
    }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HttpError);
    const httpError = failure instanceof HttpError ? failure : null;
    expect(httpError?.status).toBe(302);
    expect(httpError?.isRedirect).toBe(true);
    expect(httpError?.location).toBe("/");
    expect(httpError?.message).toBe("HTTP 302 Found - https://audio.test/nope");
  });

  it("should abort a request that exceeds its timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init: { signal: AbortSignal }) =>
          new Promise((_resolve, reject) => {
            init.signal.addEventListener("abort", () => {
              const error = new Error("This operation was aborted");
              error.name = "AbortError";
              reject(error);
            });
          }),
      ),
    );

    await expect(
      httpRequest({ method: "GET", url: "https://audio.test/slow", timeoutMs: 5 }),
    ).rejects.toMatchObject({ name: "AbortError" });
  });
});
