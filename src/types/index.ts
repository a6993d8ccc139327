/**
 * Subtitle fixing type definitions
 *
 * Time unit: every timestamp is in milliseconds (integer)
 */

/** Plain subtitle entry data, as produced by a parser */
export interface SubtitleEntryData {
  index: number;
  startTime: number;  // milliseconds
  endTime: number;    // milliseconds
  text: string;       // raw text, \N separates display lines
}

/** ISO 639-3 language code (eng, heb, ara, fas, ...) */
export type LanguageCode = string;

/** Diagnostic categories */
export type DiagnosticKind = 'rule' | 'transform' | 'configuration';

/** One recorded, non-fatal problem */
export interface DiagnosticRecord {
  kind: DiagnosticKind;
  source: string;        // rule name or modification identifier
  message: string;
  snippet?: string;      // input fragment the failure happened on
  entryIndex?: number;
}

/** Domain lookup used by the punctuation spacing rule */
export interface DomainOracle {
  /** true when the candidate parses as a host name with a known TLD; never throws */
  isDomain(candidate: string): boolean;
}

/** Modification metadata consumed by the registry */
export interface ModificationDescriptor {
  readonly identifier: string;
  readonly description: string;
  readonly longDescription?: string;
  /** can only be selected once; conflicts with other exclusive mods of the same category */
  readonly exclusive: boolean;
  readonly category?: string;
  /** lower runs earlier */
  readonly order: number;
  /** ISO 639-3 codes; empty means every language */
  readonly languages: readonly LanguageCode[];
  /** only run when the document is detected as all-uppercase */
  readonly onlyUppercase: boolean;
  /** run after every other selected modification */
  readonly applyLast: boolean;
}

/** Limits used by the short-entry merger */
export interface ShortMergeLimits {
  maxDuration: number;     // milliseconds
  maxLineLength: number;   // characters
  maxLines: number;
}

/** Fixer configuration */
export interface FixerConfig {
  language: string;            // language tag, empty = unknown
  modifications: string[];     // modification identifiers
  debug: boolean;
  maxMergeDuration: number;
  maxMergedLineLength: number;
  maxMergedLines: number;
}

/** Registry selection options */
export interface SelectOptions {
  language?: LanguageCode;
  uppercase: boolean;
}
