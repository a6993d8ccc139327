import { describe, it, expect } from 'vitest';
import { RemoveTags } from '../src/mods/remove-tags.js';
import { ReverseRTL } from '../src/mods/reverse-rtl.js';
import { FixUppercase, capitalize } from '../src/mods/fix-uppercase.js';
import { TextModification } from '../src/core/modification.js';
import { SubtitleEntry } from '../src/core/subtitle-entry.js';
import type { TextRule } from '../src/core/text-rule.js';
import { createContext, entries, texts } from './helpers.js';

class PostProcessOnly extends TextModification {
  readonly identifier = 'post_only';
  readonly description = 'No rules, post-processing only';
  readonly rules: readonly TextRule[] = [];
}

describe('empty line post-processing', () => {
  it('drops whitespace-only and empty-markup lines', () => {
    const result = new PostProcessOnly().apply(entries([0, 1000, 'Hi\\N  \\N<i> </i>']), createContext());
    expect(texts(result)).toEqual(['Hi']);
  });

  it('removes empty override tag pairs', () => {
    const result = new PostProcessOnly().apply(entries([0, 1000, '{\\i1} {\\i0}Hello']), createContext());
    expect(texts(result)).toEqual(['Hello']);
  });
});

describe('RemoveTags', () => {
  const mod = new RemoveTags();

  it('strips override tags and markup but keeps line breaks', () => {
    const result = mod.apply(entries([0, 1000, '{\\i1}Hello{\\i0}\\N<b>World</b>']), createContext());
    expect(texts(result)).toEqual(['Hello\\NWorld']);
  });

  it('keeps empty entries', () => {
    const result = mod.apply(entries([0, 1000, '']), createContext());
    expect(texts(result)).toEqual(['']);
  });
});

describe('ReverseRTL', () => {
  const mod = new ReverseRTL();

  it('is restricted to right-to-left languages', () => {
    expect(mod.supportsLanguage('heb')).toBe(true);
    expect(mod.supportsLanguage('ara')).toBe(true);
    expect(mod.supportsLanguage('fas')).toBe(true);
    expect(mod.supportsLanguage('eng')).toBe(false);
    expect(mod.supportsLanguage(undefined)).toBe(false);
  });

  it('swaps leading and trailing punctuation on every line', () => {
    const result = mod.apply(entries([0, 1000, 'שלום.\\N-מה?']), createContext('heb'));
    expect(texts(result)).toEqual(['.שלום\\N?מה-']);
  });

  it('restores the line when applied twice', () => {
    const input = entries([0, 1000, '-שלום'], [1000, 2000, 'שלום!']);
    const once = mod.apply(input, createContext('heb'));
    expect(texts(once)).toEqual(['שלום-', '!שלום']);
    expect(texts(mod.apply(once, createContext('heb')))).toEqual(['-שלום', 'שלום!']);
  });
});

describe('FixUppercase', () => {
  const mod = new FixUppercase();

  it('capitalizes each sentence-like run', () => {
    expect(capitalize('HELLO. HOW ARE YOU?')).toBe('Hello. How are you?');
    expect(capitalize('HI ♪ BYE')).toBe('Hi ♪ Bye');
    expect(capitalize('')).toBe('');
  });

  it('is declared for uppercase documents only and runs last', () => {
    expect(mod.onlyUppercase).toBe(true);
    expect(mod.applyLast).toBe(true);
  });

  it('re-cases the plain text and drops markup', () => {
    const result = mod.apply(entries([0, 1000, '{\\i1}HELLO{\\i0}\\NWORLD']), createContext());
    expect(texts(result)).toEqual(['Hello\\Nworld']);
  });

  it('passes a malformed entry through and reports it', () => {
    const broken = new SubtitleEntry({ index: 7, startTime: Number.NaN, endTime: 1000, text: 'HEY' });
    const context = createContext();
    const result = mod.apply([broken], context);

    expect(texts(result)).toEqual(['HEY']);
    expect(context.diagnostics.getRecords()).toEqual([
      {
        kind: 'transform',
        source: 'fix_uppercase',
        message: 'entry has no valid timing',
        snippet: 'HEY',
        entryIndex: 7,
      },
    ]);
  });
});
