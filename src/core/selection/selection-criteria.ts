/**
 * Selection criteria parsing.
 *
 * A spec is `[@|+]<body>[+]`, where the body is `tag:<name>`,
 * `source:<path>` or a dotted fqn pattern.
 */

import { SELECTOR_SYNTAX } from '../../constants/index.js';
import { InvalidSelectorError } from '../../utils/errors.js';

export type SelectorType = 'fqn' | 'tag' | 'source';

export interface SelectionCriteria {
  readonly raw: string;
  readonly selectParents: boolean;
  readonly selectChildren: boolean;
  readonly selectChildrensParents: boolean;
  readonly selectorType: SelectorType;
  readonly selectorValue: string;
}

const PREFIXED_SELECTORS: ReadonlyArray<[string, SelectorType]> = [
  [SELECTOR_SYNTAX.TAG_PREFIX, 'tag'],
  [SELECTOR_SYNTAX.SOURCE_PREFIX, 'source']
];

function parseSelector(spec: string, body: string): { selectorType: SelectorType; selectorValue: string } {
  for (const [prefix, selectorType] of PREFIXED_SELECTORS) {
    if (body.startsWith(prefix)) {
      const selectorValue = body.slice(prefix.length);
      if (selectorValue.length === 0) {
        throw new InvalidSelectorError(spec, `'${prefix}' requires a value`);
      }
      return { selectorType, selectorValue };
    }
  }
  return { selectorType: 'fqn', selectorValue: body };
}

export function parseSelectionCriteria(rawSpec: string): SelectionCriteria {
  const spec = rawSpec.trim();
  let body = spec;
  let selectParents = false;
  let selectChildren = false;
  let selectChildrensParents = false;

  if (body.startsWith(SELECTOR_SYNTAX.CHILDRENS_PARENTS)) {
    selectChildrensParents = true;
    body = body.slice(SELECTOR_SYNTAX.CHILDRENS_PARENTS.length);
  } else if (body.startsWith(SELECTOR_SYNTAX.PARENTS)) {
    selectParents = true;
    body = body.slice(SELECTOR_SYNTAX.PARENTS.length);
  }

  // At most one leading modifier.
  if (selectChildrensParents || selectParents) {
    const first = selectChildrensParents ? SELECTOR_SYNTAX.CHILDRENS_PARENTS : SELECTOR_SYNTAX.PARENTS;
    const second = [SELECTOR_SYNTAX.CHILDRENS_PARENTS, SELECTOR_SYNTAX.PARENTS].find(mod => body.startsWith(mod));
    if (second === first) {
      throw new InvalidSelectorError(spec, `'${first}' may only appear once at the start`);
    }
    if (second !== undefined) {
      throw new InvalidSelectorError(spec, "'@' cannot be combined with a leading '+'");
    }
  }

  if (body.endsWith(SELECTOR_SYNTAX.CHILDREN)) {
    selectChildren = true;
    body = body.slice(0, -SELECTOR_SYNTAX.CHILDREN.length);
  }

  if (selectChildrensParents && selectChildren) {
    throw new InvalidSelectorError(spec, "'@' cannot be combined with a trailing '+'");
  }

  if (body.length === 0) {
    throw new InvalidSelectorError(spec, 'no resource pattern given');
  }

  return {
    raw: spec,
    selectParents,
    selectChildren,
    selectChildrensParents,
    ...parseSelector(spec, body)
  };
}
