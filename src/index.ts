/**
 * subfix - subtitle text normalization
 */

export * from './types/index.js';

export { SubtitleEntry, LINE_BREAK } from './core/subtitle-entry.js';
export { defineRule, applyTextRule, isRuleSupported } from './core/text-rule.js';
export type { ModificationContext, Replacement, RuleMatch, TextRule } from './core/text-rule.js';
export { emptyLinePostProcessors, dropEmptyLines } from './core/post-processors.js';
export {
  BaseModification,
  TextModification,
  WholeFileModification,
  assertWellFormed,
} from './core/modification.js';
export type { Modification } from './core/modification.js';
export { ModificationRegistry } from './core/registry.js';
export { detectUppercase, UPPERCASE_SAMPLE_SIZE } from './core/uppercase.js';
export { parseSrt, serializeSrt, formatSrtTime } from './core/srt.js';

export * from './mods/index.js';

export { SubtitleFixer, createFixerService } from './services/fixer-service.js';
export type { FixerOptions, FixResult } from './services/fixer-service.js';

export { loadConfig, getDefaultConfig, validateConfig, getShortMergeLimits } from './utils/config.js';
export { setupLogger, setGlobalDebug, initFileLogging, Logger } from './utils/logger.js';
export { DiagnosticSink } from './utils/diagnostics.js';
export { ErrorCategory, ModificationError, extractErrorMessage } from './utils/error-handler.js';
export { resolveLanguage, languageMatches, getLanguageName, RTL_LANGUAGES } from './utils/language.js';
export { isDomain, tldDomainOracle, noDomainOracle } from './utils/domain.js';
