/**
 * Text rules - one pattern-match-and-replace step over a single text unit
 */

import type { DomainOracle, LanguageCode } from '../types/index.js';
import type { DiagnosticSink } from '../utils/diagnostics.js';

/** What a rule sees while running */
export interface ModificationContext {
  /** resolved ISO 639-3 code, undefined when unknown */
  language?: LanguageCode;
  domains: DomainOracle;
  diagnostics: DiagnosticSink;
}

/** One regex match handed to a match-driven replacement */
export interface RuleMatch {
  text: string;
  /** capture groups, groups[0] is the first group; unmatched groups are undefined */
  groups: Array<string | undefined>;
  index: number;
  input: string;
}

/**
 * Replacement variants
 * - literal: fixed text, $1-style group references are expanded
 * - match: fragment computed from the match
 */
export type Replacement =
  | { kind: 'literal'; value: string }
  | { kind: 'match'; build: (match: RuleMatch, context: ModificationContext) => string };

export interface TextRule {
  /** stable identifier used in diagnostics */
  name: string;
  /** always global and unicode-aware */
  pattern: RegExp;
  replacement: Replacement;
  supported?: (context: ModificationContext) => boolean;
}

function ensureFlags(pattern: RegExp): RegExp {
  const missing = ['g', 'u'].filter(flag => !pattern.flags.includes(flag)).join('');
  return missing ? new RegExp(pattern.source, pattern.flags + missing) : pattern;
}

/**
 * Build a rule; a string replacement is literal, a function is match-driven
 */
export function defineRule(
  name: string,
  pattern: RegExp,
  replacement: string | ((match: RuleMatch, context: ModificationContext) => string),
  supported?: (context: ModificationContext) => boolean
): TextRule {
  return {
    name,
    pattern: ensureFlags(pattern),
    replacement: typeof replacement === 'string'
      ? { kind: 'literal', value: replacement }
      : { kind: 'match', build: replacement },
    supported,
  };
}

/**
 * Whether the rule applies in this context
 */
export function isRuleSupported(rule: TextRule, context: ModificationContext): boolean {
  return rule.supported ? rule.supported(context) : true;
}

/**
 * Apply a rule to one text unit; may throw if a match-driven replacement does
 */
export function applyTextRule(rule: TextRule, text: string, context: ModificationContext): string {
  const { replacement } = rule;
  if (replacement.kind === 'literal') {
    return text.replace(rule.pattern, replacement.value);
  }

  let result = '';
  let last = 0;
  for (const match of text.matchAll(rule.pattern)) {
    const index = match.index ?? 0;
    result += text.slice(last, index);
    result += replacement.build(
      { text: match[0], groups: match.slice(1), index, input: text },
      context
    );
    last = index + match[0].length;
  }
  return result + text.slice(last);
}
