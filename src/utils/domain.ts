/**
 * Domain-validity oracle backed by the public suffix list
 */

import { parse } from 'tldts';
import type { DomainOracle } from '../types/index.js';

/**
 * A candidate counts as a domain when it carries a hostname whose suffix is a
 * registered ICANN TLD, e.g. "example.com" or "www.example.co.uk/path"
 */
export function isDomain(candidate: string): boolean {
  try {
    const result = parse(candidate);
    return result.isIcann === true && result.domain !== null && result.publicSuffix !== null;
  } catch {
    return false;
  }
}

export const tldDomainOracle: DomainOracle = { isDomain };

/** Oracle that never recognizes a domain */
export const noDomainOracle: DomainOracle = {
  isDomain: () => false,
};
