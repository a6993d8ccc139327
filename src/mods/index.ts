/**
 * Built-in modifications
 */

import { ModificationRegistry } from '../core/registry.js';
import type { ShortMergeLimits } from '../types/index.js';
import { CommonFixes } from './common.js';
import { FixIncremental } from './fix-incremental.js';
import { FixShort } from './fix-short.js';
import { FixUppercase } from './fix-uppercase.js';
import { RemoveTags } from './remove-tags.js';
import { ReverseRTL } from './reverse-rtl.js';

export { CommonFixes, commonRules } from './common.js';
export { RemoveTags } from './remove-tags.js';
export { ReverseRTL, reverseRtlRules } from './reverse-rtl.js';
export { FixUppercase, capitalize } from './fix-uppercase.js';
export {
  FixIncremental,
  dedupeIncrementalStep,
  filterIncrementalLine,
  initialIncrementalState,
} from './fix-incremental.js';
export type { IncrementalState, PreviousCaption } from './fix-incremental.js';
export { FixShort, mergeShortStep, packLines, DEFAULT_SHORT_MERGE_LIMITS } from './fix-short.js';
export type { ShortMergeState } from './fix-short.js';

/**
 * Registry holding every built-in modification
 */
export function createDefaultRegistry(limits: Partial<ShortMergeLimits> = {}): ModificationRegistry {
  return new ModificationRegistry()
    .register(new CommonFixes())
    .register(new RemoveTags())
    .register(new ReverseRTL())
    .register(new FixUppercase())
    .register(new FixIncremental())
    .register(new FixShort(limits));
}
