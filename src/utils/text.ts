/**
 * Text helpers
 */

/**
 * Collapse all whitespace (including line breaks) into single spaces and trim
 *
 * Stored records are one line each, so every free-text field goes through this.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
