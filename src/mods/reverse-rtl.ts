/**
 * Reverse punctuation in RTL languages
 *
 * Some playback devices don't apply bidirectional reordering to punctuation,
 * so the leading and trailing punctuation runs are physically swapped.
 */

import { TextModification } from '../core/modification.js';
import { defineRule, type TextRule } from '../core/text-rule.js';
import { RTL_LANGUAGES } from '../utils/language.js';

export const reverseRtlRules: readonly TextRule[] = [
  defineRule(
    'CM_RTL_reverse',
    /^([\s.!?:,'-]*)(.*?)([\s.!?:,'-]*)$/gu,
    match => {
      const [leading = '', core = '', trailing = ''] = match.groups;
      return `${trailing}${core}${leading}`;
    }
  ),
];

export class ReverseRTL extends TextModification {
  readonly identifier = 'reverse_rtl';
  readonly description = 'Reverse punctuation in RTL languages';
  readonly longDescription = "Some playback devices don't properly handle right-to-left markers for punctuation. " +
    'Physically swap punctuation. Applicable to languages: hebrew, arabic, farsi, persian';
  readonly exclusive = true;
  readonly order = 50;
  readonly languages = RTL_LANGUAGES;
  readonly rules = reverseRtlRules;
}
