/**
 * E2E Test: configured crawl run (lock + store lifecycle)
 *
 * Drives runConfiguredCrawl over a narrow 4-character range against both
 * store backends, with HTTP through the mock harness.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync } from "fs";
import { runConfiguredCrawl } from "@/orchestration";
import { CodeSpaceError } from "@/codeSpace";
import { acquireRunLock, createRecordStore, lockPathFor } from "@/store";
import type { CrawlerConfig, CrawlRecord, StoreBackend } from "@/types";
import { createMockHttp, loadFixtureText, type MockHttp } from "../helpers/mockHttp";
import { createTempDir, type TempDir } from "../helpers/tempDir";

const BASE_URL = "https://audio.test";

function createConfig(backend: StoreBackend, path: string): CrawlerConfig {
  return {
    baseUrl: BASE_URL,
    userAgent: "test-agent/1.0",
    threadCount: 4,
    batchSize: 10,
    interBatchDelaySeconds: 0,
    includeShortCodes: false,
    longCodeStart: "1000",
    longCodeEnd: "100z",
    requestTimeoutMs: 1000,
    retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0, maxRetryAfterMs: 0 },
    titleSuffix: " - Instaudio",
    store: { backend, path },
  };
}

async function readRecords(config: CrawlerConfig): Promise<CrawlRecord[]> {
  const store = createRecordStore(config.store);
  await store.open();
  const records: CrawlRecord[] = [];
  for await (const record of store.iterateRecords()) {
    records.push(record);
  }
  await store.close();
  return records;
}

describe.each<[StoreBackend, string]>([
  ["csv", "results.csv"],
  ["sqlite", "results.db"],
])("E2E: configured run (%s store)", (backend, fileName) => {
  let dir: TempDir;
  let mock: MockHttp;
  let config: CrawlerConfig;

  beforeEach(() => {
    dir = createTempDir();
    mock = createMockHttp();
    config = createConfig(backend, dir.path(`data/${fileName}`));

    mock.on("GET", `${BASE_URL}/1005`, loadFixtureText("pages/found.html"));
    mock.onResponse("GET", `${BASE_URL}/100a`, { status: 302, headers: { location: "/" } });
    mock.onUnmatched(async () => ({ status: 404 }));
  });

  afterEach(() => {
    dir.cleanup();
  });

  it("should crawl every code once and release the lock", async () => {
    const result = await runConfiguredCrawl(config, { request: mock.request });

    expect(result.status).toBe("completed");
    expect(result.status !== "locked" && result.state).toMatchObject({
      batchesCommitted: 4,
      probed: 36,
      found: 1,
      notFound: 35,
      errors: 0,
    });
    expect(existsSync(lockPathFor(config.store.path))).toBe(false);

    const records = await readRecords(config);
    expect(records).toHaveLength(36);
    expect(new Set(records.map((record) => record.code)).size).toBe(36);
    expect(records[0].code).toBe("1000");
    expect(records.find((record) => record.code === "1005")).toMatchObject({
      title: "Morning Birds",
      durationSeconds: 12,
      status: "200",
    });
    expect(records.find((record) => record.code === "100a")?.status).toBe("302");
  });

  it("should not probe anything on a second run", async () => {
    await runConfiguredCrawl(config, { request: mock.request });
    const requests = mock.countRequests();

    const second = await runConfiguredCrawl(config, { request: mock.request });

    expect(second.status !== "locked" && second.state.probed).toBe(0);
    expect(mock.countRequests()).toBe(requests);
  });

  it("should refuse to run while another process holds the lock", async () => {
    mkdirSync(dir.path("data"), { recursive: true });
    expect(acquireRunLock(lockPathFor(config.store.path), "other-owner")).toEqual({ ok: true });

    const result = await runConfiguredCrawl(config, { request: mock.request });

    expect(result).toEqual({ status: "locked" });
    expect(mock.countRequests()).toBe(0);
  });
});

describe("E2E: configured run validation", () => {
  it("should reject an invalid code range before touching the store", async () => {
    const dir = createTempDir();
    try {
      const config = {
        ...createConfig("csv", dir.path("data/results.csv")),
        longCodeStart: "3zzz",
        longCodeEnd: "1000",
      };
      const mock = createMockHttp();

      await expect(runConfiguredCrawl(config, { request: mock.request })).rejects.toBeInstanceOf(
        CodeSpaceError,
      );
      expect(existsSync(dir.path("data"))).toBe(false);
      expect(mock.countRequests()).toBe(0);
    } finally {
      dir.cleanup();
    }
  });
});
