import { SubtitleEntry } from '../src/core/subtitle-entry.js';
import type { ModificationContext } from '../src/core/text-rule.js';
import { DiagnosticSink } from '../src/utils/diagnostics.js';
import { noDomainOracle } from '../src/utils/domain.js';
import type { DomainOracle, LanguageCode } from '../src/types/index.js';

export function createContext(
  language?: LanguageCode,
  domains: DomainOracle = noDomainOracle
): ModificationContext {
  return { language, domains, diagnostics: new DiagnosticSink() };
}

/** Entries from [startTime, endTime, text] tuples, indexed from 1 */
export function entries(...items: Array<[number, number, string]>): SubtitleEntry[] {
  return items.map(([startTime, endTime, text], i) =>
    new SubtitleEntry({ index: i + 1, startTime, endTime, text })
  );
}

export function texts(list: readonly SubtitleEntry[]): string[] {
  return list.map(entry => entry.text);
}
