/**
 * Diagnostic channel - collects non-fatal problems met while fixing
 */

import { setupLogger, type Logger } from './logger.js';
import { ErrorCategory, ModificationError, extractErrorMessage, snippet } from './error-handler.js';
import type { DiagnosticKind, DiagnosticRecord } from '../types/index.js';

const CATEGORY_KINDS: Record<ErrorCategory, DiagnosticKind> = {
  [ErrorCategory.RULE_FAILURE]: 'rule',
  [ErrorCategory.TRANSFORM_FAILURE]: 'transform',
  [ErrorCategory.CONFIGURATION]: 'configuration',
  [ErrorCategory.UNKNOWN]: 'transform',
};

export class DiagnosticSink {
  private records: DiagnosticRecord[] = [];
  private logger: Logger;

  constructor(logger: Logger = setupLogger('diagnostics')) {
    this.logger = logger;
  }

  report(record: DiagnosticRecord): void {
    this.records.push(record);
    const where = record.entryIndex !== undefined ? ` (entry ${record.entryIndex})` : '';
    const input = record.snippet !== undefined ? ` on "${record.snippet}"` : '';
    this.logger.warn(`[${record.kind}] ${record.source}${where}: ${record.message}${input}`);
  }

  /**
   * Record a caught error; ModificationError categories map onto diagnostic kinds
   */
  reportError(
    error: unknown,
    fallback: DiagnosticKind,
    source: string,
    details: { text?: string; entryIndex?: number } = {}
  ): void {
    const kind = error instanceof ModificationError ? CATEGORY_KINDS[error.category] : fallback;
    this.report({
      kind,
      source,
      message: extractErrorMessage(error),
      snippet: details.text !== undefined ? snippet(details.text) : undefined,
      entryIndex: details.entryIndex,
    });
  }

  getRecords(): readonly DiagnosticRecord[] {
    return this.records;
  }

  count(kind?: DiagnosticKind): number {
    return kind ? this.records.filter(record => record.kind === kind).length : this.records.length;
  }

  clear(): void {
    this.records = [];
  }
}
