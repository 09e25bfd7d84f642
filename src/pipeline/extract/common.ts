import type { AttributePatch, ExtractedAttributes } from '../../types.js';

export const MAX_TEXT_LENGTH = 15000;

export interface ExtractionInput {
  subject: string;
  /** Subject and body joined, bounded to `MAX_TEXT_LENGTH`. */
  text: string;
}

/** One extraction step; an absent field is an omitted key, a `null` value clears it. */
export type AttributeExtractor = (input: ExtractionInput) => AttributePatch;

export function combineText(subject: string, body: string): string {
  return `${subject}\n\n${body}`.slice(0, MAX_TEXT_LENGTH);
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function globalOf(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

/** First capture group (or whole match) of the first pattern that matches. */
export function firstMatch(patterns: readonly RegExp[], text: string): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return match[1] ?? match[0];
    }
  }
  return null;
}

/** Every capture of `pattern` in document order. */
export function allMatches(pattern: RegExp, text: string): string[] {
  return [...text.matchAll(globalOf(pattern))].map((match) => match[1] ?? match[0]);
}

/** Text following each occurrence of each label, labels in order and occurrences by position. */
export function* labelWindows(labels: readonly RegExp[], text: string, size: number): Generator<string> {
  for (const label of labels) {
    for (const match of text.matchAll(globalOf(label))) {
      const end = (match.index ?? 0) + match[0].length;
      yield text.slice(end, end + size);
    }
  }
}

export function findAfterLabels(
  labels: readonly RegExp[],
  text: string,
  size: number,
  values: readonly RegExp[],
): string | null {
  for (const window of labelWindows(labels, text, size)) {
    const found = firstMatch(values, window);
    if (found !== null) {
      return found;
    }
  }
  return null;
}

/**
 * Applies `patch` over `base`: patch keys win, and a `null` in the patch
 * removes the key from the result.
 */
export function mergeAttributes(base: ExtractedAttributes, patch: AttributePatch): ExtractedAttributes {
  const out: ExtractedAttributes = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete out[key];
    } else {
      out[key] = value;
    }
  }
  return out;
}
