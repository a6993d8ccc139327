/**
 * Fix all-uppercase subtitles
 */

import { WholeFileModification } from '../core/modification.js';
import type { SubtitleEntry } from '../core/subtitle-entry.js';
import type { ModificationContext } from '../core/text-rule.js';

// capturing group: split() keeps the delimiters as their own segments
const SPLIT_UPPER_RE = /(\s*[.!?♪-]\s*)/u;

function capitalizeSegment(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1).toLowerCase();
}

/**
 * Capitalize every delimiter-bounded run on its own, never across a delimiter
 */
export function capitalize(text: string): string {
  return text.split(SPLIT_UPPER_RE).map(capitalizeSegment).join('');
}

export class FixUppercase extends WholeFileModification {
  readonly identifier = 'fix_uppercase';
  readonly description = 'Fixes all-uppercase subtitles';
  readonly longDescription = 'Some subtitles are in all-uppercase letters. This at least makes them readable.';
  readonly exclusive = true;
  readonly order = 41;
  readonly onlyUppercase = true;
  readonly applyLast = true;

  apply(entries: readonly SubtitleEntry[], context: ModificationContext): SubtitleEntry[] {
    return this.mapEntries(entries, context, entry => {
      entry.plaintext = capitalize(entry.plaintext);
      return entry;
    });
  }
}
