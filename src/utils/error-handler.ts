/**
 * Error handling utilities
 */

/**
 * Error categories
 */
export enum ErrorCategory {
  RULE_FAILURE = 'rule_failure',
  TRANSFORM_FAILURE = 'transform_failure',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown',
}

/**
 * Extract a readable message from anything thrown
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;

  if (typeof error === 'object' && error !== null) {
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  return String(error);
}

/**
 * Error raised inside a modification
 */
export class ModificationError extends Error {
  public readonly category: ErrorCategory;
  public readonly source: string;

  constructor(message: string, category: ErrorCategory = ErrorCategory.UNKNOWN, source = '') {
    super(message);
    this.name = 'ModificationError';
    this.category = category;
    this.source = source;
  }

  static fromError(error: unknown, category: ErrorCategory, source: string): ModificationError {
    if (error instanceof ModificationError) {
      return error;
    }
    return new ModificationError(`${source}: ${extractErrorMessage(error)}`, category, source);
  }
}

/**
 * Cut a value down for diagnostics output
 */
export function snippet(text: string, maxLength = 40): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}…` : text;
}
