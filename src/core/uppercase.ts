/**
 * Uppercase detection - decides whether only-uppercase modifications may run
 */

import type { SubtitleEntry } from './subtitle-entry.js';

// hearing-impaired annotations are often lowercase even in uppercase subtitles
const ANNOTATION_RE = /\[[^\]]*\]|\([^)]*\)/gu;
const LOWERCASE_RE = /\p{Ll}/u;
const LETTER_RE = /\p{L}/u;

/** Entries with letters inspected before deciding */
export const UPPERCASE_SAMPLE_SIZE = 40;

/**
 * A document is uppercase when none of its first sampled entries with letters
 * contains a lowercase letter; a document without letters is not
 */
export function detectUppercase(
  entries: readonly SubtitleEntry[],
  sampleSize: number = UPPERCASE_SAMPLE_SIZE
): boolean {
  let used = 0;

  for (const entry of entries) {
    const text = entry.plaintext.replace(ANNOTATION_RE, '');
    if (!LETTER_RE.test(text)) continue;

    if (LOWERCASE_RE.test(text)) {
      return false;
    }

    used++;
    if (used >= sampleSize) break;
  }

  return used > 0;
}
