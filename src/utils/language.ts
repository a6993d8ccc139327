/**
 * Language tag resolution - maps tags and names onto ISO 639-3 codes
 */

import type { LanguageCode } from '../types/index.js';

export const LANGUAGE_MAPPING: Record<string, LanguageCode> = {
  'en': 'eng',
  'eng': 'eng',
  'english': 'eng',
  'he': 'heb',
  'iw': 'heb',
  'heb': 'heb',
  'hebrew': 'heb',
  'ar': 'ara',
  'ara': 'ara',
  'arabic': 'ara',
  'fa': 'fas',
  'fas': 'fas',
  'per': 'fas',
  'farsi': 'fas',
  'persian': 'fas',
  'de': 'deu',
  'deu': 'deu',
  'ger': 'deu',
  'german': 'deu',
  'fr': 'fra',
  'fra': 'fra',
  'fre': 'fra',
  'french': 'fra',
  'es': 'spa',
  'spa': 'spa',
  'spanish': 'spa',
  'it': 'ita',
  'ita': 'ita',
  'italian': 'ita',
  'pt': 'por',
  'por': 'por',
  'portuguese': 'por',
  'nl': 'nld',
  'nld': 'nld',
  'dut': 'nld',
  'dutch': 'nld',
  'ru': 'rus',
  'rus': 'rus',
  'russian': 'rus',
};

export const LANGUAGE_NAMES: Record<LanguageCode, string> = {
  'eng': 'English',
  'heb': 'Hebrew',
  'ara': 'Arabic',
  'fas': 'Persian',
  'deu': 'German',
  'fra': 'French',
  'spa': 'Spanish',
  'ita': 'Italian',
  'por': 'Portuguese',
  'nld': 'Dutch',
  'rus': 'Russian',
};

/** Right-to-left languages */
export const RTL_LANGUAGES: readonly LanguageCode[] = ['heb', 'ara', 'fas'];

/**
 * Resolve a language tag (en, en-US, pt_BR, eng, english) to ISO 639-3
 * @returns undefined when the tag is not known
 */
export function resolveLanguage(tag: string | undefined): LanguageCode | undefined {
  if (!tag) return undefined;
  const normalized = tag.toLowerCase().trim();
  if (!normalized) return undefined;

  const direct = LANGUAGE_MAPPING[normalized];
  if (direct) return direct;

  const primary = normalized.split(/[-_]/)[0];
  return LANGUAGE_MAPPING[primary];
}

/**
 * Language display name
 */
export function getLanguageName(code: LanguageCode): string {
  return LANGUAGE_NAMES[code] || code;
}

/**
 * Whether a resolved language satisfies a declared set; an empty set accepts everything
 */
export function languageMatches(
  language: LanguageCode | undefined,
  supported: readonly LanguageCode[]
): boolean {
  if (supported.length === 0) return true;
  return language !== undefined && supported.includes(language);
}

/** Resolvable codes */
export const SUPPORTED_LANGUAGES = Object.keys(LANGUAGE_NAMES);
