/**
 * MetadataExtractor interface
 *
 * Turns the body of an existing page into structured metadata. Must not
 * throw on unexpected markup: a mismatch is reported as { ok: false }.
 */

import type { ExtractionResult } from "@/types";

export interface MetadataExtractor {
  extract(body: string): ExtractionResult;
}
