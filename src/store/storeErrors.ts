/**
 * Record store errors
 *
 * Both are fatal for a run: the orchestrator stops instead of moving on
 * with a store that no longer matches what was probed.
 */

/**
 * A batch could not be durably written
 */
export class StoreWriteError extends Error {
  public readonly batchIndex: number;

  constructor(message: string, batchIndex: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreWriteError";
    this.batchIndex = batchIndex;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreWriteError);
    }
  }
}

/**
 * The existing store does not have the expected layout
 */
export class StoreSchemaError extends Error {
  public readonly location: string;

  constructor(message: string, location: string) {
    super(message);
    this.name = "StoreSchemaError";
    this.location = location;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreSchemaError);
    }
  }
}
