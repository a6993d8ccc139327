/**
 * Modification registry - explicit, constructed once and handed to the fixer
 */

import { setupLogger } from '../utils/logger.js';
import type { DiagnosticSink } from '../utils/diagnostics.js';
import type { Modification } from './modification.js';
import type { SelectOptions } from '../types/index.js';

const logger = setupLogger('registry');

export class ModificationRegistry {
  private mods = new Map<string, Modification>();

  register(mod: Modification): this {
    if (this.mods.has(mod.identifier)) {
      throw new Error(`Modification already registered: ${mod.identifier}`);
    }
    this.mods.set(mod.identifier, mod);
    return this;
  }

  get(identifier: string): Modification | undefined {
    return this.mods.get(identifier);
  }

  has(identifier: string): boolean {
    return this.mods.has(identifier);
  }

  /** Registered modifications in declared order */
  list(): Modification[] {
    return sortByOrder([...this.mods.values()]);
  }

  /**
   * Resolve requested identifiers into the modifications to run, in run order
   *
   * - unknown identifiers are reported and skipped
   * - an exclusive modification is selected once; a second exclusive one of
   *   the same category is reported and skipped
   * - language-restricted and only-uppercase modifications are skipped when
   *   they don't apply
   * - ascending order, apply-last modifications after all others
   */
  select(identifiers: readonly string[], options: SelectOptions, diagnostics: DiagnosticSink): Modification[] {
    const selected: Modification[] = [];
    const categories = new Map<string, string>();

    for (const identifier of identifiers) {
      const mod = this.mods.get(identifier);
      if (!mod) {
        diagnostics.report({
          kind: 'configuration',
          source: identifier,
          message: 'unknown modification',
        });
        continue;
      }

      if (selected.includes(mod)) {
        if (!mod.exclusive) {
          logger.debug(`${identifier} requested more than once`);
        }
        continue;
      }

      if (mod.exclusive && mod.category) {
        const taken = categories.get(mod.category);
        if (taken) {
          diagnostics.report({
            kind: 'configuration',
            source: identifier,
            message: `exclusive with ${taken} (category ${mod.category})`,
          });
          continue;
        }
        categories.set(mod.category, identifier);
      }

      if (!mod.supportsLanguage(options.language)) {
        logger.debug(`${identifier} skipped: not applicable to language ${options.language ?? 'unknown'}`);
        continue;
      }

      if (mod.onlyUppercase && !options.uppercase) {
        logger.debug(`${identifier} skipped: subtitle is not uppercase`);
        continue;
      }

      selected.push(mod);
    }

    return sortByOrder(selected);
  }
}

function sortByOrder(mods: Modification[]): Modification[] {
  // stable: equal orders keep request order
  return [...mods].sort((a, b) => {
    if (a.applyLast !== b.applyLast) {
      return a.applyLast ? 1 : -1;
    }
    return a.order - b.order;
  });
}
