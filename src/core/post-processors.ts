/**
 * Entry post-processors - run per line after a rule set, before empty lines are dropped
 */

import { defineRule, type TextRule } from './text-rule.js';

export const emptyLinePostProcessors: readonly TextRule[] = [
  // {\i1}  {\i0}
  defineRule('PP_empty_tag', /(\{\\\w1\})[\s.,\-_!?]*(\{\\\w0\})/gu, ''),

  // <i> </i>
  defineRule('PP_empty_markup', /<([ibus])>[\s.,\-_!?]*<\/\1>/giu, ''),

  defineRule('PP_empty_line', /^\s+$/gu, ''),
];

/** Lines left empty by the rules */
export function dropEmptyLines(lines: readonly string[]): string[] {
  return lines.filter(line => line.length > 0);
}
