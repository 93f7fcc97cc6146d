/**
 * Code space type definitions
 */

/**
 * One fixed-width slice of the identifier space
 */
export type LengthClass = {
  /** Number of characters in every code of this class */
  length: number;
  /** First code yielded (inclusive). Defaults to the all-zero code. */
  start?: string;
  /** Last code yielded (inclusive). Defaults to the all-max code. */
  end?: string;
  /** Codes inside the range that are never yielded (e.g. placeholders) */
  exclude?: readonly string[];
};

/**
 * Validated code space: alphabet plus ordered length classes
 */
export type CodeSpace = {
  alphabet: string;
  classes: readonly LengthClass[];
};
