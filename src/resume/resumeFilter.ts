/**
 * Resume filter
 *
 * Skips identifiers that already have a committed record. The settled set is
 * a snapshot loaded once at startup; it is never re-read during a run.
 */

/**
 * Lazily yield the codes that are not settled, preserving order
 *
 * With an empty settled set this is an identity pass-through.
 *
 * @param codes - Full code sequence (from the code space generator)
 * @param settled - Codes with a committed record
 */
export function* filterUnsettled(
  codes: Iterable<string>,
  settled: ReadonlySet<string>,
): Generator<string> {
  if (settled.size === 0) {
    yield* codes;
    return;
  }

  for (const code of codes) {
    if (!settled.has(code)) {
      yield code;
    }
  }
}

/**
 * Lazily group codes into batches of at most `batchSize`
 *
 * The final batch may be shorter; no empty batch is ever yielded.
 */
export function* takeBatches(
  codes: Iterable<string>,
  batchSize: number,
): Generator<string[]> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  let batch: string[] = [];
  for (const code of codes) {
    batch.push(code);
    if (batch.length >= batchSize) {
      yield batch;
      batch = [];
    }
  }

  if (batch.length > 0) {
    yield batch;
  }
}
