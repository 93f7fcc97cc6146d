/**
 * Unit tests for the crawl orchestrator
 *
 * Runs against an in-memory store and a scripted executor.
 */

import { describe, it, expect, vi } from "vitest";
import { runCrawl, CrawlHaltedError, type CrawlDependencies } from "@/orchestration";
import { AudioPageExtractor } from "@/extractor";
import type { CrawlRecord, ProbeOutcome } from "@/types";
import { MemoryRecordStore } from "../helpers/memoryRecordStore";

const BASE_URL = "https://audio.test";

function notFound(code: string): ProbeOutcome {
  return { status: "not_found", code, url: `${BASE_URL}/${code}`, httpStatus: 404, attempts: 1 };
}

/**
 * Executor that answers 404 for every code and records each batch
 */
function createScriptedExecutor(
  answer: (code: string) => ProbeOutcome = notFound,
): CrawlDependencies["executor"] & { batches: string[][] } {
  const batches: string[][] = [];
  return {
    batches,
    probeBatch: async (codes) => {
      batches.push([...codes]);
      return codes.map(answer);
    },
  };
}

function createDeps(
  overrides: Partial<CrawlDependencies> & { store: MemoryRecordStore },
): CrawlDependencies {
  return {
    codes: ["a", "b", "c", "d", "e"],
    executor: createScriptedExecutor(),
    extractor: new AudioPageExtractor(),
    delay: async () => true,
    ...overrides,
  };
}

const options = { batchSize: 2, interBatchDelaySeconds: 0 };

describe("runCrawl", () => {
  it("should commit one record per code in numbered batches", async () => {
    const store = new MemoryRecordStore();

    const state = await runCrawl(createDeps({ store }), options);

    expect(store.commits.map((batch) => batch.index)).toEqual([1, 2, 3]);
    expect(store.records.map((record) => record.code)).toEqual(["a", "b", "c", "d", "e"]);
    expect(state).toEqual({
      phase: "TERMINATED",
      batchesCommitted: 3,
      lastCommittedBatch: 3,
      probed: 5,
      found: 0,
      notFound: 5,
      errors: 0,
      extractionErrors: 0,
      interrupted: false,
    });
  });

  it("should skip codes that are already settled", async () => {
    const store = new MemoryRecordStore(["b", "d"].map(emptyRecord));
    const executor = createScriptedExecutor();

    await runCrawl(createDeps({ store, executor }), options);

    expect(executor.batches).toEqual([["a", "c"], ["e"]]);
  });

  it("should not probe anything when every code is settled", async () => {
    const store = new MemoryRecordStore(["a", "b", "c", "d", "e"].map(emptyRecord));
    const executor = createScriptedExecutor();

    const state = await runCrawl(createDeps({ store, executor }), options);

    expect(executor.batches).toEqual([]);
    expect(state.probed).toBe(0);
    expect(state.phase).toBe("TERMINATED");
  });

  it("should pause between batches but not after the last one", async () => {
    const store = new MemoryRecordStore();
    const delay = vi.fn(async (_ms: number, _signal?: AbortSignal) => true);

    await runCrawl(createDeps({ store, delay }), { batchSize: 2, interBatchDelaySeconds: 0.5 });

    expect(delay).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(500, undefined);
  });

  it("should halt with the last committed batch when a commit fails", async () => {
    const store = new MemoryRecordStore();
    store.failOnBatch(2);
    const executor = createScriptedExecutor();

    const run = runCrawl(createDeps({ store, executor }), options);

    await expect(run).rejects.toThrow(CrawlHaltedError);
    await expect(run).rejects.toMatchObject({ lastCommittedBatch: 1 });
    expect(store.records.map((record) => record.code)).toEqual(["a", "b"]);
    expect(executor.batches).toHaveLength(2);
  });

  it("should record an extractor crash as an extraction error", async () => {
    const store = new MemoryRecordStore();
    const executor = createScriptedExecutor((code) => ({
      status: "found",
      code,
      url: `${BASE_URL}/${code}`,
      httpStatus: 200,
      body: "<html></html>",
      attempts: 1,
    }));
    const extractor = {
      extract: () => {
        throw new Error("parser exploded");
      },
    };

    const state = await runCrawl(
      createDeps({ store, executor, extractor, codes: ["a"] }),
      options,
    );

    expect(store.records[0]).toMatchObject({
      code: "a",
      status: "EXTRACTION_ERROR",
      error: "Extractor failed: parser exploded",
    });
    expect(state.extractionErrors).toBe(1);
  });

  it("should stop when the polite delay is interrupted", async () => {
    const store = new MemoryRecordStore();

    const state = await runCrawl(
      createDeps({ store, delay: async () => false }),
      options,
    );

    expect(store.commits).toHaveLength(1);
    expect(state.interrupted).toBe(true);
    expect(state.phase).toBe("TERMINATED");
  });

  it("should commit the outcomes of an interrupted batch and stop", async () => {
    const store = new MemoryRecordStore();
    const controller = new AbortController();
    const executor: CrawlDependencies["executor"] = {
      probeBatch: async (codes) => {
        controller.abort();
        return codes.slice(0, 1).map(notFound);
      },
    };

    const state = await runCrawl(createDeps({ store, executor }), {
      ...options,
      signal: controller.signal,
    });

    expect(store.records.map((record) => record.code)).toEqual(["a"]);
    expect(state).toMatchObject({ interrupted: true, batchesCommitted: 1, probed: 1 });
  });

  it("should halt when the run lock can no longer be refreshed", async () => {
    const store = new MemoryRecordStore();
    const lock = { refresh: () => false };

    await expect(runCrawl(createDeps({ store, lock }), options)).rejects.toMatchObject({
      name: "CrawlHaltedError",
      lastCommittedBatch: 1,
    });
    expect(store.commits).toHaveLength(1);
  });
});

function emptyRecord(code: string): CrawlRecord {
  return {
    url: `${BASE_URL}/${code}`,
    code,
    title: "",
    duration: "",
    durationSeconds: null,
    listens: null,
    downloads: null,
    status: "404",
    error: "",
  };
}
