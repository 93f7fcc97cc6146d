/**
 * Audio page metadata extractor
 *
 * Extraction strategy:
 * 1. Title from <title>, with the site suffix removed
 * 2. Duration from the first <time> element
 * 3. Listen/download counters from the visible page text
 */

import * as cheerio from "cheerio";
import type { ExtractionResult } from "@/types";
import type { MetadataExtractor } from "@/interfaces";
import {
  DEFAULT_TITLE_SUFFIX,
  LISTENS_PATTERN,
  DOWNLOADS_PATTERN,
} from "@/constants";
import { collapseWhitespace, getErrorMessage } from "@/utils";
import { parseDuration, formatDuration } from "./duration";

/**
 * Parse the first counter matching the pattern ("1,234 listens" -> 1234)
 */
export function parseCounter(text: string, pattern: RegExp): number {
  const match = pattern.exec(text);
  if (!match) {
    return 0;
  }
  const value = parseInt(match[1].replace(/,/g, ""), 10);
  return isNaN(value) ? 0 : value;
}

/**
 * Remove the site suffix from a page title
 */
export function cleanTitle(rawTitle: string, suffix: string): string {
  const title = collapseWhitespace(rawTitle);
  const trimmedSuffix = suffix.trim();
  const withoutSuffix =
    trimmedSuffix && title.endsWith(trimmedSuffix)
      ? title.slice(0, title.length - trimmedSuffix.length).trim()
      : title;
  return withoutSuffix || "Unknown";
}

export class AudioPageExtractor implements MetadataExtractor {
  private readonly titleSuffix: string;

  constructor(options: { titleSuffix?: string } = {}) {
    this.titleSuffix = options.titleSuffix ?? DEFAULT_TITLE_SUFFIX;
  }

  extract(body: string): ExtractionResult {
    try {
      const $ = cheerio.load(body);

      const titleElement = $("title").first();
      if (titleElement.length === 0) {
        return { ok: false, error: "Page has no <title> element" };
      }

      const title = cleanTitle(titleElement.text(), this.titleSuffix);

      const durationText = collapseWhitespace($("time").first().text());
      const durationSeconds = parseDuration(durationText);

      $("script, style, noscript").remove();
      const pageText = collapseWhitespace($("body").text());

      return {
        ok: true,
        metadata: {
          title,
          durationDisplay: formatDuration(durationSeconds),
          durationSeconds,
          listens: parseCounter(pageText, LISTENS_PATTERN),
          downloads: parseCounter(pageText, DOWNLOADS_PATTERN),
        },
      };
    } catch (error) {
      return { ok: false, error: `Failed to parse page: ${getErrorMessage(error)}` };
    }
  }
}
