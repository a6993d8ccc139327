/**
 * Modification base classes
 *
 * Two capability sets share one descriptor:
 * - TextModification: an ordered rule set run on every display line of every entry
 * - WholeFileModification: a transform over the whole entry sequence
 */

import { setupLogger, type Logger } from '../utils/logger.js';
import { ErrorCategory, ModificationError } from '../utils/error-handler.js';
import { languageMatches } from '../utils/language.js';
import { LINE_BREAK, SubtitleEntry } from './subtitle-entry.js';
import { applyTextRule, isRuleSupported, type ModificationContext, type TextRule } from './text-rule.js';
import { dropEmptyLines, emptyLinePostProcessors } from './post-processors.js';
import type { LanguageCode, ModificationDescriptor, SubtitleEntryData } from '../types/index.js';

/**
 * Throws when an entry cannot be processed
 */
export function assertWellFormed(entry: SubtitleEntryData, source: string): void {
  if (typeof entry.text !== 'string') {
    throw new ModificationError('entry has no text', ErrorCategory.TRANSFORM_FAILURE, source);
  }
  if (!Number.isFinite(entry.startTime) || !Number.isFinite(entry.endTime)) {
    throw new ModificationError('entry has no valid timing', ErrorCategory.TRANSFORM_FAILURE, source);
  }
}

export abstract class BaseModification implements ModificationDescriptor {
  abstract readonly identifier: string;
  abstract readonly description: string;
  readonly longDescription?: string;
  readonly exclusive: boolean = false;
  readonly category?: string;
  readonly order: number = 100;
  readonly languages: readonly LanguageCode[] = [];
  readonly onlyUppercase: boolean = false;
  readonly applyLast: boolean = false;

  protected get logger(): Logger {
    return setupLogger(this.identifier);
  }

  supportsLanguage(language: LanguageCode | undefined): boolean {
    return languageMatches(language, this.languages);
  }

  /**
   * Returns a new sequence; neither the array nor its entries are mutated
   */
  abstract apply(entries: readonly SubtitleEntry[], context: ModificationContext): SubtitleEntry[];
}

export abstract class TextModification extends BaseModification {
  readonly kind = 'text' as const;
  abstract readonly rules: readonly TextRule[];
  readonly postProcessors: readonly TextRule[] = emptyLinePostProcessors;

  apply(entries: readonly SubtitleEntry[], context: ModificationContext): SubtitleEntry[] {
    return entries.map(entry => this.modifyEntry(entry, context));
  }

  modifyEntry(entry: SubtitleEntry, context: ModificationContext): SubtitleEntry {
    try {
      assertWellFormed(entry, this.identifier);
    } catch (error) {
      context.diagnostics.reportError(error, 'transform', this.identifier, { entryIndex: entry.index });
      return entry.copy();
    }

    // predicates are evaluated once per entry
    const active = this.rules.filter(rule => this.checkSupported(rule, context, entry.index));
    const lines = entry.lines
      .map(line => this.runRules(active, line, context, entry.index))
      .map(line => this.runRules(this.postProcessors, line, context, entry.index));

    return entry.copy({ text: dropEmptyLines(lines).join(LINE_BREAK) });
  }

  /**
   * Run the whole rule set over a single text unit
   */
  processText(text: string, context: ModificationContext): string {
    const active = this.rules.filter(rule => this.checkSupported(rule, context));
    return this.runRules(active, text, context);
  }

  private checkSupported(rule: TextRule, context: ModificationContext, entryIndex?: number): boolean {
    try {
      return isRuleSupported(rule, context);
    } catch (error) {
      context.diagnostics.reportError(error, 'rule', rule.name, { entryIndex });
      return false;
    }
  }

  private runRules(
    rules: readonly TextRule[],
    text: string,
    context: ModificationContext,
    entryIndex?: number
  ): string {
    let current = text;
    for (const rule of rules) {
      try {
        const next = applyTextRule(rule, current, context);
        if (next !== current) {
          this.logger.debug(`${rule.name}: "${current}" -> "${next}"`);
        }
        current = next;
      } catch (error) {
        context.diagnostics.reportError(error, 'rule', rule.name, { text: current, entryIndex });
      }
    }
    return current;
  }
}

export abstract class WholeFileModification extends BaseModification {
  readonly kind = 'whole-file' as const;

  /**
   * Map entries one by one; an entry that fails passes through unmodified
   */
  protected mapEntries(
    entries: readonly SubtitleEntry[],
    context: ModificationContext,
    modify: (entry: SubtitleEntry) => SubtitleEntry
  ): SubtitleEntry[] {
    return entries.map(entry => {
      try {
        assertWellFormed(entry, this.identifier);
        return modify(entry.copy());
      } catch (error) {
        this.reportFailure(error, entry, context);
        return entry.copy();
      }
    });
  }

  protected reportFailure(error: unknown, entry: SubtitleEntry, context: ModificationContext): void {
    const text = typeof entry.text === 'string' ? entry.text : undefined;
    context.diagnostics.reportError(error, 'transform', this.identifier, { text, entryIndex: entry.index });
  }
}

export type Modification = TextModification | WholeFileModification;
