/**
 * Node Selector
 *
 * Resolves include and exclude spec lists against a dependency graph and
 * its resource catalog. Selection is synchronous and read-only; the graph
 * and catalog must not change during a call.
 */

import { ancestors, descendants, type DependencyGraphView } from '../graph/dependency-graph.js';
import type { ResourceCatalog } from '../graph/resource-catalog.js';
import { logger } from '../../utils/logger.js';
import { nodeMatches } from './matcher.js';
import { parseSelectionCriteria, type SelectionCriteria } from './selection-criteria.js';

function addAll(target: Set<string>, source: Iterable<string>): void {
  for (const id of source) {
    target.add(id);
  }
}

export class NodeSelector {
  constructor(private readonly catalog: ResourceCatalog) {}

  /**
   * Nodes whose metadata satisfies the criterion's selector, ignoring direction.
   */
  getDirectMatches(graph: DependencyGraphView, criteria: SelectionCriteria): Set<string> {
    const matches = new Set<string>();
    for (const id of graph.nodes()) {
      const node = this.catalog.lookup(id);
      if (nodeMatches(node, criteria.selectorType, criteria.selectorValue)) {
        matches.add(id);
      }
    }
    return matches;
  }

  /**
   * Direct matches widened by the criterion's directional modifiers.
   */
  collectForCriteria(graph: DependencyGraphView, criteria: SelectionCriteria): Set<string> {
    const direct = this.getDirectMatches(graph, criteria);
    const selected = new Set(direct);

    if (criteria.selectChildrensParents) {
      addAll(selected, descendants(graph, direct));
      addAll(selected, ancestors(graph, selected));
    } else {
      if (criteria.selectParents) {
        addAll(selected, ancestors(graph, direct));
      }
      if (criteria.selectChildren) {
        addAll(selected, descendants(graph, direct));
      }
    }

    logger.debug(`Selector '${criteria.raw}' matched ${direct.size} node(s), ${selected.size} after expansion`);
    return selected;
  }

  /**
   * Union of the nodes selected by each criterion.
   */
  collectAll(graph: DependencyGraphView, criteria: readonly SelectionCriteria[]): Set<string> {
    const selected = new Set<string>();
    for (const criterion of criteria) {
      addAll(selected, this.collectForCriteria(graph, criterion));
    }
    return selected;
  }

  selectNodes(
    graph: DependencyGraphView,
    includeSpecs: readonly string[],
    excludeSpecs: readonly string[]
  ): Set<string> {
    // Parse everything before traversing: one malformed spec fails the call.
    const includeCriteria = includeSpecs.map(spec => parseSelectionCriteria(spec));
    const excludeCriteria = excludeSpecs.map(spec => parseSelectionCriteria(spec));

    const included = this.collectAll(graph, includeCriteria);
    const excluded = this.collectAll(graph, excludeCriteria);

    const selected = new Set<string>();
    for (const id of included) {
      if (!excluded.has(id)) {
        selected.add(id);
      }
    }

    logger.debug('Node selection complete', {
      include: includeSpecs,
      exclude: excludeSpecs,
      included: included.size,
      excluded: excluded.size,
      selected: selected.size
    });
    return selected;
  }
}

/**
 * Distinct package names (first fqn segment) across the graph's nodes.
 */
export function getPackageNames(graph: DependencyGraphView, catalog: ResourceCatalog): Set<string> {
  const names = new Set<string>();
  for (const id of graph.nodes()) {
    names.add(catalog.lookup(id).fqn[0]);
  }
  return names;
}
