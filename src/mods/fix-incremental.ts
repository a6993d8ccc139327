/**
 * Fix incremental (typewriter-style) captions
 *
 * Some sources emit growing captions where each entry repeats the previous
 * one plus a small addition. Traversal is an explicit fold: the accumulator
 * carries the previous entry, so every step can be tested on its own.
 */

import { WholeFileModification, assertWellFormed } from '../core/modification.js';
import { LINE_BREAK, type SubtitleEntry } from '../core/subtitle-entry.js';
import type { ModificationContext } from '../core/text-rule.js';
import { setupLogger } from '../utils/logger.js';

const logger = setupLogger('fix_incremental');

const WORD_BOUNDARY_RE = /^[^\p{L}\p{N}_]/u;

export interface PreviousCaption {
  /** text after filtering */
  text: string;
  /** text before filtering */
  source: string;
}

export interface IncrementalState {
  previous: PreviousCaption | null;
  output: SubtitleEntry[];
}

export function initialIncrementalState(): IncrementalState {
  return { previous: null, output: [] };
}

/**
 * Keep what a line adds to the previous caption
 * @returns null when the line is a duplicate remainder
 */
export function filterIncrementalLine(line: string, previous: PreviousCaption): string | null {
  const lowered = line.toLowerCase();

  // whole previous text, not just its last line
  if (previous.text && previous.text.toLowerCase().endsWith(lowered)) {
    return null;
  }

  // the previous caption grew; the prefix only counts up to a word boundary
  const sourceLines = previous.source.split(LINE_BREAK);
  const lastSourceLine = (sourceLines[sourceLines.length - 1] ?? '').toLowerCase();
  if (lastSourceLine && lowered.startsWith(lastSourceLine)) {
    const remainder = line.slice(lastSourceLine.length);
    if (!remainder) {
      return null;
    }
    if (WORD_BOUNDARY_RE.test(remainder)) {
      return remainder;
    }
  }

  return line;
}

/**
 * One fold step; the first entry passes through unchanged
 * The output array is appended in place, start each run from initialIncrementalState()
 */
export function dedupeIncrementalStep(state: IncrementalState, entry: SubtitleEntry): IncrementalState {
  const { previous } = state;
  let current = entry.copy();

  if (previous) {
    const kept: string[] = [];
    for (const line of entry.lines) {
      const filtered = filterIncrementalLine(line, previous);
      if (filtered === null) {
        logger.debug(`Skipping incremental/dup: ${line}`);
        continue;
      }
      kept.push(filtered);
    }
    current = entry.copy({ text: kept.join(LINE_BREAK) });
  }

  state.output.push(current);
  return {
    previous: { text: current.text, source: entry.text },
    output: state.output,
  };
}

export class FixIncremental extends WholeFileModification {
  readonly identifier = 'fix_incremental';
  readonly description = 'Fixes incremental-repeating subtitles';
  readonly longDescription = 'Removes the repeated part of captions that grow by a few words per entry';
  readonly exclusive = true;
  readonly order = 60;

  apply(entries: readonly SubtitleEntry[], context: ModificationContext): SubtitleEntry[] {
    const result = entries.reduce<IncrementalState>((state, entry) => {
      try {
        assertWellFormed(entry, this.identifier);
        return dedupeIncrementalStep(state, entry);
      } catch (error) {
        this.reportFailure(error, entry, context);
        state.output.push(entry.copy());
        return state;
      }
    }, initialIncrementalState());

    return result.output;
  }
}
