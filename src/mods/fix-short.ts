/**
 * Merge short, fast-flashing entries backward into the entry before them
 */

import { WholeFileModification, assertWellFormed } from '../core/modification.js';
import { LINE_BREAK, type SubtitleEntry } from '../core/subtitle-entry.js';
import type { ModificationContext } from '../core/text-rule.js';
import type { ShortMergeLimits } from '../types/index.js';
import { setupLogger } from '../utils/logger.js';

const logger = setupLogger('fix_short');

export const DEFAULT_SHORT_MERGE_LIMITS: ShortMergeLimits = {
  maxDuration: 500,
  maxLineLength: 200,
  maxLines: 3,
};

// a line that ends in punctuation completes the line before it
const COMPLETES_LINE_RE = /^.+[^\p{L}\p{N}_]$/u;

export interface ShortMergeState {
  output: SubtitleEntry[];
}

/**
 * Pack an entry's lines: a line ending in punctuation is appended to the
 * running line when both fit into maxLineLength
 */
export function packLines(lines: readonly string[], maxLineLength: number): string[] {
  const packed: string[] = [];

  for (const line of lines) {
    if (!line) continue;

    const lastLine = packed[packed.length - 1] ?? '';
    const merged = /\s$/u.test(lastLine) ? lastLine + line : `${lastLine} ${line}`;
    if (
      lastLine &&
      lastLine !== line &&
      merged.length <= maxLineLength &&
      COMPLETES_LINE_RE.test(line)
    ) {
      logger.debug(`Merging '${lastLine}' with '${line}' to '${merged}'`);
      packed[packed.length - 1] = merged;
    } else {
      packed.push(line);
    }
  }

  return packed;
}

/**
 * Fold step, shaped as a reduce callback; the state's output grows in place
 *
 * "last lines" always come from the preceding input entry, never from an
 * entry merged earlier in this run; the merged entry is bounded by maxLines
 * on its own.
 */
export function mergeShortStep(limits: ShortMergeLimits = DEFAULT_SHORT_MERGE_LIMITS) {
  return (
    state: ShortMergeState,
    entry: SubtitleEntry,
    index: number,
    entries: readonly SubtitleEntry[]
  ): ShortMergeState => {
    const previous = state.output[state.output.length - 1];
    if (index === 0 || !previous) {
      state.output.push(entry.copy());
      return state;
    }

    const lastLines = entries[index - 1].lines;
    const hasSpace = lastLines.length < limits.maxLines;
    const packed = packLines(entry.lines, limits.maxLineLength);
    const previousLines = previous.text ? previous.lines : [];

    const shouldMerge =
      previous.duration < limits.maxDuration &&
      entry.duration < limits.maxDuration &&
      packed.length < limits.maxLines &&
      hasSpace &&
      previousLines.length + packed.length <= limits.maxLines;

    if (!shouldMerge) {
      state.output.push(entry.copy({ text: packed.join(LINE_BREAK) }));
      return state;
    }

    logger.debug(`Merging entry ${entry.index} into entry ${previous.index}`);
    const merged = previous.copy({
      text: [...previousLines, ...packed].join(LINE_BREAK),
      endTime: Math.max(previous.endTime, entry.endTime),
    });
    state.output[state.output.length - 1] = merged;
    return state;
  };
}

export class FixShort extends WholeFileModification {
  readonly identifier = 'fix_short';
  readonly description = 'Merges short, fast-flashing entries';
  readonly longDescription = 'Merges very short entries into the entry before them while the merged entry ' +
    'stays within the duration, line length and line count limits';
  readonly exclusive = true;
  readonly order = 70;

  private readonly limits: ShortMergeLimits;

  constructor(limits: Partial<ShortMergeLimits> = {}) {
    super();
    this.limits = { ...DEFAULT_SHORT_MERGE_LIMITS, ...limits };
  }

  getLimits(): ShortMergeLimits {
    return { ...this.limits };
  }

  apply(entries: readonly SubtitleEntry[], context: ModificationContext): SubtitleEntry[] {
    const step = mergeShortStep(this.limits);
    const result = entries.reduce<ShortMergeState>((state, entry, index, all) => {
      try {
        assertWellFormed(entry, this.identifier);
        return step(state, entry, index, all);
      } catch (error) {
        this.reportFailure(error, entry, context);
        state.output.push(entry.copy());
        return state;
      }
    }, { output: [] });

    return result.output;
  }
}
