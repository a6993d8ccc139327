/**
 * End-to-end runs through the fixer
 */

import { describe, it, expect, vi } from 'vitest';
import { createFixerService } from '../src/services/fixer-service.js';
import { createDefaultRegistry } from '../src/mods/index.js';
import { WholeFileModification } from '../src/core/modification.js';
import { getDefaultConfig } from '../src/utils/config.js';
import { noDomainOracle } from '../src/utils/domain.js';
import type { SubtitleEntry } from '../src/core/subtitle-entry.js';
import { entries, texts } from './helpers.js';

function fixer(language = '') {
  const config = { ...getDefaultConfig(), language };
  return createFixerService(config, createDefaultRegistry(), noDomainOracle);
}

class ExplodingMod extends WholeFileModification {
  readonly identifier = 'explode';
  readonly description = 'Always fails';

  apply(): SubtitleEntry[] {
    throw new Error('boom');
  }
}

describe('SubtitleFixer', () => {
  it('applies language-restricted rules for a resolved language', () => {
    const result = fixer('en').fix(entries([0, 1000, 'i  know']), ['common']);

    expect(texts(result.entries)).toEqual(['I know']);
    expect(result.applied).toEqual(['common']);
    expect(result.diagnostics).toEqual([]);
  });

  it('reports an unknown language and skips language-restricted modifications', () => {
    const result = fixer('xx').fix(entries([0, 1000, 'Hi!']), ['common', 'reverse_rtl']);

    expect(result.applied).toEqual(['common']);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ kind: 'configuration', source: 'language' });
  });

  it('leaves its input untouched', () => {
    const input = entries([0, 1000, 'Hello   there']);
    fixer().fix(input, ['common']);
    expect(input[0].text).toBe('Hello   there');
  });

  it('is deterministic', () => {
    const input = entries([0, 300, '-Hey--you'], [300, 500, 'what?!'], [500, 2000, 'Bye.....']);
    const first = fixer().fix(input, ['common', 'fix_short']);
    const second = fixer().fix(input, ['common', 'fix_short']);

    expect(second.entries.map(entry => entry.toJSON())).toEqual(first.entries.map(entry => entry.toJSON()));
  });

  it('merges short entries', () => {
    const result = fixer().fix(entries([0, 300, 'A'], [300, 500, 'B'], [500, 1100, 'C']), ['fix_short']);

    expect(result.entries.map(entry => entry.toJSON())).toEqual([
      { index: 1, startTime: 0, endTime: 500, text: 'A\\NB' },
      { index: 3, startTime: 500, endTime: 1100, text: 'C' },
    ]);
  });

  it('re-cases an uppercase document after the other fixes', () => {
    const result = fixer().fix(
      entries([0, 1000, 'HELLO. HOW ARE YOU?'], [1000, 2000, 'HI ♪ BYE']),
      ['fix_uppercase', 'common']
    );

    expect(result.applied).toEqual(['common', 'fix_uppercase']);
    expect(texts(result.entries)).toEqual(['Hello. How are you?', 'Hi ♪ Bye']);
  });

  it('keeps the previous sequence when a modification fails', () => {
    const registry = createDefaultRegistry().register(new ExplodingMod());
    const service = createFixerService(getDefaultConfig(), registry, noDomainOracle);
    const result = service.fix(entries([0, 1000, 'Hello   there']), ['common', 'explode']);

    expect(texts(result.entries)).toEqual(['Hello there']);
    expect(result.diagnostics).toEqual([
      { kind: 'transform', source: 'explode', message: 'explode: boom', snippet: undefined, entryIndex: undefined },
    ]);
  });

  it('asks the domain oracle before spacing punctuation', () => {
    const isDomain = vi.fn((candidate: string) => candidate === 'example.com');
    const service = createFixerService(getDefaultConfig(), createDefaultRegistry(), { isDomain });
    const result = service.fix(entries([0, 1000, 'Visit example.com today'], [1000, 2000, 'Yes,sir']), ['common']);

    expect(isDomain).toHaveBeenCalledWith('example.com');
    expect(isDomain).toHaveBeenCalledWith('Yes,sir');
    expect(texts(result.entries)).toEqual(['Visit example.com today', 'Yes, sir']);
  });

  it('fixes SRT content', () => {
    const content =
      '1\n00:00:01,000 --> 00:00:02,000\nHello  there\n\n' +
      '2\n00:00:02,000 --> 00:00:04,000\n-How are you?\n';
    const result = fixer().fixSrt(content, ['common']);

    expect(result.content).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nHello there\n\n' +
      '2\n00:00:02,000 --> 00:00:04,000\n- How are you?\n'
    );
  });
});
