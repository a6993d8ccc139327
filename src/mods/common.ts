/**
 * Common fixes - whitespace, punctuation, dash and quote normalization
 *
 * Rule order matters: every rule works on the output of the one before it.
 */

import { TextModification } from '../core/modification.js';
import { defineRule, type TextRule } from '../core/text-rule.js';

export const commonRules: readonly TextRule[] = [
  // normalize hyphens
  defineRule('CM_hyphens', /[‑‐﹘﹣]/gu, '-'),

  // -- = em dash
  defineRule('CM_multidash', /([\p{L}\p{N}_\s]|^|(?<=[\p{L}\p{N}_]))(-\s?-{1,2})/gu, '$1—'),

  // line = _/-/\s
  defineRule('CM_non_word_only', /^[^\p{L}\p{N}_]*[-_.:<>~"']+[^\p{L}\p{N}_]*$/gu, ''),

  // remove >>
  defineRule('CM_leading_crocodiles', /^\s?>>\s*/gu, ''),

  // line = : text
  defineRule('CM_empty_colon_start', /^[^\p{L}\p{N}_]*:\s*(?=[\p{L}\p{N}_])/gu, ''),

  // fix music symbols
  defineRule(
    'CM_music_symbols',
    /(^[-\s>~]*[*#¶]+\s+)|(\s*[*#¶]+\s*$)/gu,
    match => (match.groups[0] ? '♪ ' : ' ♪')
  ),

  // '' = "
  defineRule('CM_double_apostrophe', /['’ʼ❜‘‛]['’ʼ❜‘‛]+/gu, '"'),

  // double quotes instead of single quotes inside words
  defineRule('CM_double_as_single', /([A-zÀ-ž])"([A-zÀ-ž])/gu, "$1'$2"),

  // normalize quotes
  defineRule(
    'CM_normalize_quotes',
    /(\s*["”“‟„])\s*(["”“‟„]["”“‟„\s]*)/gu,
    match => '"' + ((match.groups[1] ?? '').endsWith(' ') ? ' ' : '')
  ),

  // normalize single quotes
  defineRule('CM_normalize_squotes', /['’ʼ❜‘‛]/gu, "'"),

  // remove leading ...
  defineRule('CM_leading_ellipsis', /^\.\.\.\s*/gu, ''),

  // remove "downloaded from" tags
  defineRule('CM_crap', /^.*downloaded\s+from.*$/giu, ''),

  // no space after ellipsis
  defineRule('CM_ellipsis_no_space', /\.\.\.(?![\s.,!?'"])(?!$)/gu, '... '),

  // no space before spaced ellipsis
  defineRule('CM_ellipsis_no_space2', /(?<=\S)\. \. \./gu, ' . . .'),

  // multiple spaces
  defineRule('CM_multiple_spaces', /\s{2,}/gu, ' '),

  // more than 3 dots
  defineRule('CM_dots', /\.{3,}/gu, '...'),

  // no space after starting dash
  defineRule('CM_dash_space', /^-(?![\s-])/gu, '- '),

  // remove starting spaced dots (not matching ellipses)
  defineRule('CM_starting_spacedots', /^(?!\s?\.\s\.\s\.|\s?\.{3})(?=\.+\s+)[\s.]*/gu, ''),

  // replace uppercase I with lowercase L in words
  defineRule(
    'CM_uppercase_i_in_word',
    /([a-zà-ž]+)(I+)/gu,
    match => `${match.groups[0] ?? ''}${'l'.repeat((match.groups[1] ?? '').length)}`
  ),

  // fix spaces in numbers; a span with more than one space is most likely a countdown
  defineRule(
    'CM_spaces_in_numbers',
    /(?<![\p{L}\p{N}_])[0-9]+[0-9:']*\s+(?!\.\.)[0-9,.:'\s]*[0-9]/gu,
    match => (match.text.split(' ').length - 1 === 1 ? match.text.replace(/ /g, '') : match.text)
  ),

  // uppercase after dot, unless the word before looks like initials or a number
  defineRule(
    'CM_uppercase_after_dot',
    /((?![A-ZÀ-Ž\-_0-9.])[^.\s]+\.\s+)([a-zà-ž])/gu,
    match => `${match.groups[0] ?? ''}${(match.groups[1] ?? '').toUpperCase()}`
  ),

  // remove double interpunction
  defineRule(
    'CM_double_interpunct',
    /(\s*[,!?])\s*([,.!?][,.!?\s]*)/gu,
    match => (match.groups[0] ?? '').trim() + ((match.groups[1] ?? '').endsWith(' ') ? ' ' : '')
  ),

  // remove spaces before punctuation; don't break spaced ellipses
  defineRule('CM_punctuation_space', /(?:^|(?<=[\p{L}\p{N}_])) +([!?.,](?![!?.,]| \.))/gu, '$1'),

  // add space after punctuation, unless the token is a domain name
  defineRule(
    'CM_punctuation_space2',
    /([^\s]*)([!?.,:])([A-zÀ-ž]{2,})/gu,
    (match, context) => {
      if (context.domains.isDomain(match.text)) {
        return match.text;
      }
      const [before = '', mark = '', word = ''] = match.groups;
      return `${before}${mark} ${word}`;
    }
  ),

  // fix lowercase i in english
  defineRule(
    'CM_EN_lowercase_i',
    /(?<![\p{L}\p{N}_])i(?![\p{L}\p{N}_])/gu,
    'I',
    context => context.language === 'eng'
  ),
];

export class CommonFixes extends TextModification {
  readonly identifier = 'common';
  readonly description = 'Basic common fixes';
  readonly longDescription = 'Fix common and whitespace/punctuation issues in subtitles';
  readonly exclusive = true;
  readonly order = 40;
  readonly rules = commonRules;
}
