/**
 * Fixer service - selects modifications and runs them over an entry sequence
 */

import { setupLogger } from '../utils/logger.js';
import { DiagnosticSink } from '../utils/diagnostics.js';
import { ErrorCategory, ModificationError } from '../utils/error-handler.js';
import { getLanguageName, resolveLanguage } from '../utils/language.js';
import { tldDomainOracle } from '../utils/domain.js';
import { getShortMergeLimits } from '../utils/config.js';
import { SubtitleEntry } from '../core/subtitle-entry.js';
import { detectUppercase } from '../core/uppercase.js';
import { parseSrt, serializeSrt } from '../core/srt.js';
import type { ModificationRegistry } from '../core/registry.js';
import type { ModificationContext } from '../core/text-rule.js';
import { createDefaultRegistry } from '../mods/index.js';
import type {
  DiagnosticRecord,
  DomainOracle,
  FixerConfig,
  LanguageCode,
  SubtitleEntryData,
} from '../types/index.js';

const logger = setupLogger('fixer-service');

export interface FixerOptions {
  /** language tag of the subtitle */
  language?: string;
  domains?: DomainOracle;
}

export interface FixResult {
  entries: SubtitleEntry[];
  /** identifiers of the modifications that ran, in run order */
  applied: string[];
  diagnostics: readonly DiagnosticRecord[];
}

export class SubtitleFixer {
  private registry: ModificationRegistry;
  private languageTag: string;
  private domains: DomainOracle;

  constructor(registry: ModificationRegistry, options: FixerOptions = {}) {
    this.registry = registry;
    this.languageTag = options.language ?? '';
    this.domains = options.domains ?? tldDomainOracle;
  }

  /**
   * Run the selected modifications over a copy of the entries
   */
  fix(input: readonly SubtitleEntryData[], identifiers: readonly string[]): FixResult {
    const diagnostics = new DiagnosticSink();
    const language = this.resolveLanguage(diagnostics);
    let entries = input.map(entry => SubtitleEntry.from(entry));

    const uppercase = detectUppercase(entries);
    if (uppercase) {
      logger.info('Subtitle detected as all-uppercase');
    }

    const mods = this.registry.select(identifiers, { language, uppercase }, diagnostics);
    const context: ModificationContext = { language, domains: this.domains, diagnostics };

    for (const mod of mods) {
      const before = entries.length;
      try {
        entries = mod.apply(entries, context);
      } catch (error) {
        // the sequence stays as the previous modification left it
        const failure = ModificationError.fromError(error, ErrorCategory.TRANSFORM_FAILURE, mod.identifier);
        diagnostics.reportError(failure, 'transform', mod.identifier);
        continue;
      }
      logger.debug(`${mod.identifier}: ${before} -> ${entries.length} entries`);
    }

    const applied = mods.map(mod => mod.identifier);
    logger.info(`Applied ${applied.length ? applied.join(', ') : 'no modifications'} to ${entries.length} entries`);
    if (diagnostics.count() > 0) {
      logger.warn(`${diagnostics.count()} diagnostics recorded`);
    }

    return { entries, applied, diagnostics: diagnostics.getRecords() };
  }

  /**
   * Parse, fix and serialize SRT content
   */
  fixSrt(content: string, identifiers: readonly string[]): FixResult & { content: string } {
    const entries = parseSrt(content);
    logger.info(`📊 ${entries.length} subtitle entries`);
    const result = this.fix(entries, identifiers);
    return { ...result, content: serializeSrt(result.entries) };
  }

  private resolveLanguage(diagnostics: DiagnosticSink): LanguageCode | undefined {
    if (!this.languageTag) {
      return undefined;
    }

    const language = resolveLanguage(this.languageTag);
    if (!language) {
      diagnostics.report({
        kind: 'configuration',
        source: 'language',
        message: `unknown language tag "${this.languageTag}", language-restricted modifications are skipped`,
      });
      return undefined;
    }

    logger.debug(`Language: ${getLanguageName(language)}`);
    return language;
  }
}

/**
 * Create a fixer from configuration
 */
export function createFixerService(
  config: FixerConfig,
  registry: ModificationRegistry = createDefaultRegistry(getShortMergeLimits(config)),
  domains: DomainOracle = tldDomainOracle
): SubtitleFixer {
  return new SubtitleFixer(registry, { language: config.language, domains });
}
