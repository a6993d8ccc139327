/**
 * Registry selection: ordering, gating and exclusivity
 */

import { describe, it, expect } from 'vitest';
import { ModificationRegistry } from '../src/core/registry.js';
import { WholeFileModification } from '../src/core/modification.js';
import type { SubtitleEntry } from '../src/core/subtitle-entry.js';
import { DiagnosticSink } from '../src/utils/diagnostics.js';
import { createDefaultRegistry } from '../src/mods/index.js';

class CasingMod extends WholeFileModification {
  readonly description = 'Casing under test';
  readonly exclusive = true;
  readonly category = 'casing';

  constructor(readonly identifier: string) {
    super();
  }

  apply(entries: readonly SubtitleEntry[]): SubtitleEntry[] {
    return entries.map(entry => entry.copy());
  }
}

function select(identifiers: string[], language?: string, uppercase = false) {
  const diagnostics = new DiagnosticSink();
  const mods = createDefaultRegistry().select(identifiers, { language, uppercase }, diagnostics);
  return { ids: mods.map(mod => mod.identifier), diagnostics };
}

describe('ModificationRegistry', () => {
  describe('register', () => {
    it('rejects a duplicate identifier', () => {
      const registry = new ModificationRegistry().register(new CasingMod('lower'));
      expect(() => registry.register(new CasingMod('lower'))).toThrow('Modification already registered: lower');
    });

    it('lists every built-in modification in run order', () => {
      expect(createDefaultRegistry().list().map(mod => mod.identifier)).toEqual([
        'remove_tags',
        'common',
        'reverse_rtl',
        'fix_incremental',
        'fix_short',
        'fix_uppercase',
      ]);
    });
  });

  describe('select', () => {
    it('sorts by order regardless of request order', () => {
      expect(select(['fix_short', 'common', 'remove_tags']).ids).toEqual(['remove_tags', 'common', 'fix_short']);
    });

    it('reports unknown identifiers and skips repeats', () => {
      const { ids, diagnostics } = select(['common', 'nope', 'common']);

      expect(ids).toEqual(['common']);
      expect(diagnostics.getRecords()).toEqual([
        { kind: 'configuration', source: 'nope', message: 'unknown modification' },
      ]);
    });

    it('gates language-restricted modifications', () => {
      expect(select(['reverse_rtl'], 'heb').ids).toEqual(['reverse_rtl']);
      expect(select(['reverse_rtl'], 'eng').ids).toEqual([]);
      expect(select(['reverse_rtl']).ids).toEqual([]);
    });

    it('runs uppercase fixes only on uppercase documents, and last', () => {
      expect(select(['fix_uppercase', 'fix_short']).ids).toEqual(['fix_short']);
      expect(select(['fix_uppercase', 'fix_short'], undefined, true).ids).toEqual(['fix_short', 'fix_uppercase']);
    });

    it('reports a second exclusive modification of the same category', () => {
      const registry = new ModificationRegistry()
        .register(new CasingMod('lower'))
        .register(new CasingMod('upper'));
      const diagnostics = new DiagnosticSink();
      const mods = registry.select(['lower', 'upper'], { uppercase: false }, diagnostics);

      expect(mods.map(mod => mod.identifier)).toEqual(['lower']);
      expect(diagnostics.getRecords()).toEqual([
        { kind: 'configuration', source: 'upper', message: 'exclusive with lower (category casing)' },
      ]);
    });
  });
});
