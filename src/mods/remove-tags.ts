/**
 * Remove all style tags (font, bold, italic, color, ...), keep line breaks
 */

import { WholeFileModification } from '../core/modification.js';
import type { SubtitleEntry } from '../core/subtitle-entry.js';
import type { ModificationContext } from '../core/text-rule.js';

export class RemoveTags extends WholeFileModification {
  readonly identifier = 'remove_tags';
  readonly description = 'Remove all style tags';
  readonly longDescription = 'Removes all possible style tags from the subtitle, such as font, bold, color etc.';
  readonly exclusive = true;
  readonly order = 0;

  apply(entries: readonly SubtitleEntry[], context: ModificationContext): SubtitleEntry[] {
    return this.mapEntries(entries, context, entry => {
      // reading plaintext drops the markup, writing it back turns newlines into \N again
      entry.plaintext = entry.plaintext;
      return entry;
    });
  }
}
