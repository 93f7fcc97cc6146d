/**
 * Unit tests for the probe executor
 *
 * Uses the mock HTTP harness; retry delays go through an injected no-op sleep.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ProbeExecutor, RetryPolicy } from "@/probe";
import { createMockHttp, type MockHttp } from "../helpers/mockHttp";

const BASE_URL = "https://audio.test";

describe("ProbeExecutor", () => {
  let mock: MockHttp;
  let sleep: (ms: number) => Promise<void>;

  beforeEach(() => {
    mock = createMockHttp();
    sleep = vi.fn(async (_ms: number) => {});
  });

  function createExecutor(
    overrides: { maxAttempts?: number; threadCount?: number } = {},
  ): ProbeExecutor {
    return new ProbeExecutor({
      baseUrl: BASE_URL,
      userAgent: "test-agent/1.0",
      threadCount: overrides.threadCount ?? 4,
      timeoutMs: 2000,
      retryPolicy: new RetryPolicy(
        { maxAttempts: overrides.maxAttempts ?? 3, baseDelayMs: 100 },
        () => 0,
      ),
      request: mock.request,
      sleep,
    });
  }

  describe("probe", () => {
    it("should resolve a 2xx page as found with its body", async () => {
      mock.on("GET", `${BASE_URL}/abc`, "<html>page</html>");

      const outcome = await createExecutor().probe("abc");

      expect(outcome).toEqual({
        status: "found",
        code: "abc",
        url: `${BASE_URL}/abc`,
        httpStatus: 200,
        body: "<html>page</html>",
        attempts: 1,
      });
    });

    it("should send the user agent with manual redirects", async () => {
      mock.on("GET", `${BASE_URL}/abc`, "");

      await createExecutor().probe("abc");

      const [request] = mock.getRecordedRequests();
      expect(request).toEqual({
        method: "GET",
        url: `${BASE_URL}/abc`,
        headers: { "User-Agent": "test-agent/1.0" },
        timeoutMs: 2000,
        redirect: "manual",
      });
    });

    it("should keep the real status of a non-200 success", async () => {
      mock.onResponse("GET", `${BASE_URL}/abc`, { status: 203, body: "<html>cached</html>" });

      const outcome = await createExecutor().probe("abc");

      expect(outcome).toMatchObject({ status: "found", httpStatus: 203, body: "<html>cached</html>" });
    });

    it("should resolve 404 as not_found without retrying", async () => {
      mock.onResponse("GET", `${BASE_URL}/zzz`, { status: 404 });

      const outcome = await createExecutor().probe("zzz");

      expect(outcome).toEqual({
        status: "not_found",
        code: "zzz",
        url: `${BASE_URL}/zzz`,
        httpStatus: 404,
        attempts: 1,
      });
      expect(mock.countRequests()).toBe(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should follow a trailing-slash redirect on the same code", async () => {
      mock.onResponse("GET", `${BASE_URL}/abc`, {
        status: 301,
        headers: { location: "/abc/" },
      });
      mock.on("GET", `${BASE_URL}/abc/`, "<html>page</html>");

      const outcome = await createExecutor().probe("abc");

      expect(outcome).toEqual({
        status: "found",
        code: "abc",
        url: `${BASE_URL}/abc`,
        httpStatus: 200,
        body: "<html>page</html>",
        attempts: 1,
      });
      expect(mock.getRecordedRequests().map((req) => req.url)).toEqual([
        `${BASE_URL}/abc`,
        `${BASE_URL}/abc/`,
      ]);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should treat a redirect to another page as not_found", async () => {
      mock.onResponse("GET", `${BASE_URL}/r02`, {
        status: 302,
        headers: { location: `${BASE_URL}/other` },
      });

      const outcome = await createExecutor().probe("r02");

      expect(outcome).toEqual({
        status: "not_found",
        code: "r02",
        url: `${BASE_URL}/r02`,
        httpStatus: 302,
        attempts: 1,
      });
      expect(mock.countRequests()).toBe(1);
    });

    it("should stop following a same-code redirect loop", async () => {
      mock.onResponse("GET", `${BASE_URL}/abc`, { status: 301, headers: { location: "/abc/" } });
      mock.onResponse("GET", `${BASE_URL}/abc/`, { status: 301, headers: { location: "/abc" } });

      const outcome = await createExecutor().probe("abc");

      expect(outcome).toMatchObject({ status: "not_found", httpStatus: 301, attempts: 1 });
      expect(mock.countRequests()).toBe(4);
    });

    it("should resolve a redirect to the home page as not_found", async () => {
      mock.onResponse("GET", `${BASE_URL}/r01`, {
        status: 302,
        headers: { location: "/" },
      });

      const outcome = await createExecutor().probe("r01");

      expect(outcome.status).toBe("not_found");
      expect(outcome.status === "not_found" && outcome.httpStatus).toBe(302);
    });

    it("should retry a transient failure and then succeed", async () => {
      let calls = 0;
      mock.onCustom("GET", `${BASE_URL}/abc`, async () => {
        calls++;
        return calls === 1 ? { status: 503 } : { status: 200, body: "ok" };
      });

      const outcome = await createExecutor().probe("abc");

      expect(outcome.status).toBe("found");
      expect(outcome.attempts).toBe(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(50);
    });

    it("should wait for Retry-After on 429", async () => {
      let calls = 0;
      mock.onCustom("GET", `${BASE_URL}/abc`, async () => {
        calls++;
        return calls === 1
          ? { status: 429, headers: { "retry-after": "2" } }
          : { status: 200, body: "ok" };
      });

      await createExecutor().probe("abc");

      expect(sleep).toHaveBeenCalledWith(2000);
    });

    it("should downgrade a code that times out on every attempt to fatal_error", async () => {
      mock.onTimeout("GET", `${BASE_URL}/xyz`);

      const outcome = await createExecutor({ maxAttempts: 3 }).probe("xyz");

      expect(outcome).toEqual({
        status: "fatal_error",
        code: "xyz",
        url: `${BASE_URL}/xyz`,
        httpStatus: undefined,
        error: "Request timed out (after 3 attempts)",
        attempts: 3,
        exhausted: true,
      });
      expect(mock.countRequests(`${BASE_URL}/xyz`)).toBe(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it("should keep the last HTTP status when retries run out", async () => {
      mock.onResponse("GET", `${BASE_URL}/e50`, { status: 500 });

      const outcome = await createExecutor({ maxAttempts: 2 }).probe("e50");

      expect(outcome).toMatchObject({
        status: "fatal_error",
        httpStatus: 500,
        error: "HTTP 500 Mock Response (after 2 attempts)",
        attempts: 2,
      });
    });
  });

  describe("probeBatch", () => {
    it("should return one outcome per code in batch order", async () => {
      const delays: Record<string, number> = { a01: 15, a02: 1, a03: 5 };
      mock.onUnmatched(async (req) => {
        const code = req.url.slice(BASE_URL.length + 1);
        await new Promise((resolve) => setTimeout(resolve, delays[code] ?? 0));
        return code === "a02" ? { status: 404 } : { status: 200, body: code };
      });

      const outcomes = await createExecutor().probeBatch(["a01", "a02", "a03"]);

      expect(outcomes.map((o) => [o.code, o.status])).toEqual([
        ["a01", "found"],
        ["a02", "not_found"],
        ["a03", "found"],
      ]);
    });

    it("should never run more than threadCount probes at once", async () => {
      let active = 0;
      let maxActive = 0;
      mock.onUnmatched(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 2));
        active--;
        return { status: 404 };
      });

      const codes = Array.from({ length: 10 }, (_, i) => `c${i}`);
      const outcomes = await createExecutor({ threadCount: 3 }).probeBatch(codes);

      expect(outcomes).toHaveLength(10);
      expect(maxActive).toBe(3);
    });

    it("should start nothing when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      const outcomes = await createExecutor().probeBatch(["a01", "a02"], {
        signal: controller.signal,
      });

      expect(outcomes).toEqual([]);
      expect(mock.countRequests()).toBe(0);
    });

    it("should finish in-flight probes and skip unstarted codes after abort", async () => {
      const controller = new AbortController();
      mock.onCustom("GET", `${BASE_URL}/a01`, async () => {
        controller.abort();
        return { status: 200, body: "first" };
      });

      const outcomes = await createExecutor({ threadCount: 1 }).probeBatch(
        ["a01", "a02", "a03"],
        { signal: controller.signal },
      );

      expect(outcomes.map((o) => o.code)).toEqual(["a01"]);
      expect(outcomes[0].status).toBe("found");
      expect(mock.countRequests()).toBe(1);
    });
  });

  it("should reject a non-positive thread count", () => {
    expect(
      () => new ProbeExecutor({ baseUrl: BASE_URL, threadCount: 0, request: mock.request }),
    ).toThrow(RangeError);
  });
});
