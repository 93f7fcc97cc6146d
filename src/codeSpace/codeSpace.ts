/**
 * Code space generator
 *
 * Enumerates every fixed-width code of each configured length class, in
 * increasing base-N order. The sequence is deterministic and restartable:
 * resume correctness depends on every run walking the same order.
 */

import type { CodeSpace, CrawlerConfig, LengthClass } from "@/types";
import {
  BASE36_ALPHABET,
  SHORT_CODE_LENGTH,
  SHORT_CODE_EXCLUDE,
  LONG_CODE_LENGTH,
} from "@/constants";

/**
 * Invalid alphabet or length class
 */
export class CodeSpaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodeSpaceError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CodeSpaceError);
    }
  }
}

/**
 * Encode a base-N value as a fixed-width code (left-padded with the zero symbol)
 */
export function encodeCode(value: number, length: number, alphabet: string): string {
  const base = alphabet.length;
  let code = "";
  let n = value;
  for (let i = 0; i < length; i++) {
    code = alphabet[n % base] + code;
    n = Math.floor(n / base);
  }
  return code;
}

/**
 * Decode a code to its base-N value
 *
 * @throws {CodeSpaceError} If the code contains a character outside the alphabet
 */
export function decodeCode(code: string, alphabet: string): number {
  const base = alphabet.length;
  let value = 0;
  for (const char of code) {
    const digit = alphabet.indexOf(char);
    if (digit < 0) {
      throw new CodeSpaceError(`Character "${char}" of code "${code}" is not in the alphabet`);
    }
    value = value * base + digit;
  }
  return value;
}

/**
 * Inclusive numeric bounds of a length class
 */
function classBounds(cls: LengthClass, alphabet: string): { first: number; last: number } {
  const first = cls.start !== undefined ? decodeCode(cls.start, alphabet) : 0;
  const last =
    cls.end !== undefined
      ? decodeCode(cls.end, alphabet)
      : Math.pow(alphabet.length, cls.length) - 1;
  return { first, last };
}

function validateBoundCode(
  code: string,
  cls: LengthClass,
  alphabet: string,
  label: string,
): void {
  if (code.length !== cls.length) {
    throw new CodeSpaceError(
      `${label} "${code}" does not have length ${cls.length}`,
    );
  }
  decodeCode(code, alphabet);
}

function validateAlphabet(alphabet: string): void {
  if (alphabet.length < 2) {
    throw new CodeSpaceError("Alphabet must contain at least 2 characters");
  }
  if (new Set(alphabet).size !== alphabet.length) {
    throw new CodeSpaceError(`Alphabet "${alphabet}" contains duplicate characters`);
  }
}

function validateClass(cls: LengthClass, alphabet: string): void {
  if (!Number.isInteger(cls.length) || cls.length < 1) {
    throw new CodeSpaceError(`Invalid code length: ${cls.length}`);
  }
  if (Math.pow(alphabet.length, cls.length) > Number.MAX_SAFE_INTEGER) {
    throw new CodeSpaceError(`Code length ${cls.length} is too large for this alphabet`);
  }
  if (cls.start !== undefined) {
    validateBoundCode(cls.start, cls, alphabet, "Start code");
  }
  if (cls.end !== undefined) {
    validateBoundCode(cls.end, cls, alphabet, "End code");
  }
  for (const code of cls.exclude ?? []) {
    validateBoundCode(code, cls, alphabet, "Excluded code");
  }

  const { first, last } = classBounds(cls, alphabet);
  if (first > last) {
    throw new CodeSpaceError(
      `Start code "${cls.start}" comes after end code "${cls.end}"`,
    );
  }
}

/**
 * Build a validated code space
 *
 * Classes of the same length must not overlap, so no code is yielded twice.
 *
 * @throws {CodeSpaceError} On an invalid alphabet, class, or overlapping classes
 */
export function createCodeSpace(
  alphabet: string,
  classes: readonly LengthClass[],
): CodeSpace {
  validateAlphabet(alphabet);

  if (classes.length === 0) {
    throw new CodeSpaceError("At least one length class is required");
  }

  classes.forEach((cls) => validateClass(cls, alphabet));

  for (let i = 0; i < classes.length; i++) {
    for (let j = i + 1; j < classes.length; j++) {
      if (classes[i].length !== classes[j].length) {
        continue;
      }
      const a = classBounds(classes[i], alphabet);
      const b = classBounds(classes[j], alphabet);
      if (a.first <= b.last && b.first <= a.last) {
        throw new CodeSpaceError(
          `Length classes ${i} and ${j} overlap (length ${classes[i].length})`,
        );
      }
    }
  }

  return { alphabet, classes };
}

function* iterateCodes(space: CodeSpace): Generator<string> {
  for (const cls of space.classes) {
    const { first, last } = classBounds(cls, space.alphabet);
    const excluded = new Set(cls.exclude ?? []);

    for (let value = first; value <= last; value++) {
      const code = encodeCode(value, cls.length, space.alphabet);
      if (!excluded.has(code)) {
        yield code;
      }
    }
  }
}

/**
 * Lazy, finite, restartable sequence of every code in the space
 *
 * Each call to [Symbol.iterator] starts again from the first code.
 */
export function generateCodes(space: CodeSpace): Iterable<string> {
  return {
    [Symbol.iterator]: () => iterateCodes(space),
  };
}

/**
 * Number of codes the space yields
 */
export function countCodes(space: CodeSpace): number {
  return space.classes.reduce((total, cls) => {
    const { first, last } = classBounds(cls, space.alphabet);
    const excludedInRange = new Set(
      (cls.exclude ?? []).filter((code) => {
        const value = decodeCode(code, space.alphabet);
        return value >= first && value <= last;
      }),
    ).size;
    return total + (last - first + 1) - excludedInRange;
  }, 0);
}

/**
 * Build the crawler's code space from configuration
 *
 * Short (3-character) codes come first when enabled, then the bounded
 * 4-character range.
 */
export function buildCodeSpaceFromConfig(
  config: Pick<CrawlerConfig, "includeShortCodes" | "longCodeStart" | "longCodeEnd">,
): CodeSpace {
  const classes: LengthClass[] = [];

  if (config.includeShortCodes) {
    classes.push({ length: SHORT_CODE_LENGTH, exclude: SHORT_CODE_EXCLUDE });
  }

  classes.push({
    length: LONG_CODE_LENGTH,
    start: config.longCodeStart,
    end: config.longCodeEnd,
  });

  return createCodeSpace(BASE36_ALPHABET, classes);
}
