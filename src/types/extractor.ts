/**
 * Metadata extractor type definitions
 */

/**
 * Metadata extracted from an existing audio page
 */
export type AudioMetadata = {
  title: string;
  /** Human-readable duration (MM:SS, or "?:??" when unknown) */
  durationDisplay: string;
  durationSeconds: number;
  listens: number;
  downloads: number;
};

/**
 * Extraction result: metadata, or the reason the page did not match
 */
export type ExtractionResult =
  | { ok: true; metadata: AudioMetadata }
  | { ok: false; error: string };
