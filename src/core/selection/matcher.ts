/**
 * Node matching for a single selection criterion, independent of direction.
 */

import { SELECTOR_SYNTAX } from '../../constants/index.js';
import type { Fqn, NodeMetadata } from '../../types/index.js';
import type { SelectorType } from './selection-criteria.js';

function isPrefix(pattern: readonly string[], candidate: readonly string[]): boolean {
  if (pattern.length > candidate.length) {
    return false;
  }
  return pattern.every((part, index) => part === candidate[index]);
}

/**
 * Whether a split fqn pattern selects the node at `fqn`.
 *
 * A trailing `*` matches any suffix. The remaining pattern must be a prefix
 * of either the full path or the path without its package, so `shop.staging`,
 * `staging` and `staging.orders` all address `['shop', 'staging', 'orders']`.
 */
export function isSelectedNode(fqn: Fqn, pattern: readonly string[]): boolean {
  const effective = pattern[pattern.length - 1] === SELECTOR_SYNTAX.WILDCARD
    ? pattern.slice(0, -1)
    : pattern;

  return isPrefix(effective, fqn) || isPrefix(effective, fqn.slice(1));
}

export function splitFqnPattern(value: string): string[] {
  return value.split(SELECTOR_SYNTAX.PATH_SEPARATOR);
}

export function nodeMatches(node: NodeMetadata, selectorType: SelectorType, selectorValue: string): boolean {
  switch (selectorType) {
    case 'tag':
      return node.tags.has(selectorValue);
    case 'source':
      return node.kind === 'source' && isSelectedNode(node.fqn, splitFqnPattern(selectorValue));
    case 'fqn':
      return isSelectedNode(node.fqn, splitFqnPattern(selectorValue));
  }
}
