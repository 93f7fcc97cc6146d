/**
 * Duration parsing and formatting
 */

import { UNKNOWN_DURATION_DISPLAY } from "@/constants";

const DURATION_PART = /^\d+(?:\.\d+)?$/;

/**
 * Parse "M:SS", "MM:SS" or "H:MM:SS" into whole seconds
 *
 * Returns 0 for empty or malformed text.
 */
export function parseDuration(text: string): number {
  const trimmed = text.trim();
  if (!trimmed.includes(":")) {
    return 0;
  }

  const parts = trimmed.split(":").map((part) => part.trim());
  if (parts.length < 2 || parts.length > 3 || !parts.every((p) => DURATION_PART.test(p))) {
    return 0;
  }

  const values = parts.map(Number);
  const seconds =
    values.length === 3
      ? values[0] * 3600 + values[1] * 60 + values[2]
      : values[0] * 60 + values[1];

  return Math.floor(seconds);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format seconds as "MM:SS" (minutes are not wrapped into hours)
 *
 * Zero means unknown and is shown as "?:??".
 */
export function formatDuration(seconds: number): string {
  if (!seconds) {
    return UNKNOWN_DURATION_DISPLAY;
  }
  return `${pad2(Math.floor(seconds / 60))}:${pad2(seconds % 60)}`;
}
