export { parseSelectionCriteria, type SelectionCriteria, type SelectorType } from './selection-criteria.js';
export { isSelectedNode, nodeMatches, splitFqnPattern } from './matcher.js';
export { NodeSelector, getPackageNames } from './node-selector.js';
