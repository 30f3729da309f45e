import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NodeSelector, getPackageNames } from '../../../src/core/selection/node-selector.js';
import { parseSelectionCriteria } from '../../../src/core/selection/selection-criteria.js';
import { DependencyGraph } from '../../../src/core/graph/dependency-graph.js';
import { InMemoryResourceCatalog } from '../../../src/core/graph/resource-catalog.js';
import { CatalogLookupError, InvalidSelectorError } from '../../../src/utils/errors.js';
import { buildTreeGraph, modelNode } from '../../test-helpers.js';

describe('NodeSelector', () => {
  const { graph, catalog } = buildTreeGraph();
  const selector = new NodeSelector(catalog);

  function assertSelection(include: string[], exclude: string[], expected: string[]): void {
    assert.deepStrictEqual(selector.selectNodes(graph, include, exclude), new Set(expected));
  }

  it('selects a single node by package and name', () => {
    assertSelection(['X.a'], [], ['m.X.a']);
  });

  it('selects by tag', () => {
    assertSelection(['tag:abc'], [], ['m.X.a', 'm.Y.b', 'm.X.c']);
  });

  it('excludes by tag', () => {
    assertSelection(['*'], ['tag:abc'], ['m.Y.d', 'm.X.e', 'm.Y.f', 'm.X.g']);
  });

  it('unions include specs', () => {
    assertSelection(['tag:abc', 'a'], [], ['m.X.a', 'm.Y.b', 'm.X.c']);
    assertSelection(['tag:abc', 'd'], [], ['m.X.a', 'm.Y.b', 'm.X.c', 'm.Y.d']);
    assertSelection(['X.a', 'b'], [], ['m.X.a', 'm.Y.b']);
  });

  it('selects children except an excluded name', () => {
    assertSelection(['X.a+'], ['b'], ['m.X.a', 'm.X.c', 'm.Y.d', 'm.X.e', 'm.Y.f', 'm.X.g']);
  });

  it('selects children except a tag', () => {
    assertSelection(['X.a+'], ['tag:efg'], ['m.X.a', 'm.Y.b', 'm.X.c', 'm.Y.d']);
  });

  it('selects parents at every depth', () => {
    assertSelection(['+X.e'], [], ['m.X.a', 'm.Y.b', 'm.X.e']);
  });

  it('selects parents and children together', () => {
    assertSelection(['+Y.b+'], [], ['m.X.a', 'm.Y.b', 'm.Y.d', 'm.X.e']);
  });

  it("selects children's parents", () => {
    assertSelection(['@X.c'], [], ['m.X.a', 'm.X.c', 'm.Y.f', 'm.X.g']);
  });

  it('selects nothing when no node matches', () => {
    assertSelection(['Z.*'], [], []);
    assertSelection(['tag:missing+'], [], []);
  });

  it('fails the whole call on one malformed spec', () => {
    assert.throws(() => selector.selectNodes(graph, ['X.a', '@X.c+'], []), InvalidSelectorError);
    assert.throws(() => selector.selectNodes(graph, ['X.a'], ['@b+']), InvalidSelectorError);
    assert.throws(() => selector.selectNodes(graph, ['@+X.c'], []), InvalidSelectorError);
    assert.throws(() => selector.selectNodes(graph, ['+@X.c'], []), InvalidSelectorError);
  });

  it('is idempotent', () => {
    const first = selector.selectNodes(graph, ['tag:abc+', '@Y.f'], ['X.e']);
    const second = selector.selectNodes(graph, ['tag:abc+', '@Y.f'], ['X.e']);
    assert.deepStrictEqual(first, second);
  });

  it('treats exclusion as set difference', () => {
    const include = ['X.a+'];
    const exclude = ['+Y.f', 'tag:efg'];
    const included = selector.selectNodes(graph, include, []);
    const excluded = selector.selectNodes(graph, exclude, []);
    const difference = new Set([...included].filter(id => !excluded.has(id)));
    assert.deepStrictEqual(selector.selectNodes(graph, include, exclude), difference);
    assert.deepStrictEqual(difference, new Set(['m.Y.b', 'm.Y.d']));
  });

  it('expands direct matches by direction', () => {
    const criteria = parseSelectionCriteria('b+');
    assert.deepStrictEqual(selector.getDirectMatches(graph, criteria), new Set(['m.Y.b']));
    assert.deepStrictEqual(selector.collectForCriteria(graph, criteria), new Set(['m.Y.b', 'm.Y.d', 'm.X.e']));
  });

  it('fails loudly when a graph node has no catalog entry', () => {
    const sparseGraph = new DependencyGraph();
    sparseGraph.addNode('m.X.a');
    sparseGraph.addNode('m.X.ghost');
    const sparseCatalog = new InMemoryResourceCatalog([modelNode('m.X.a', ['X', 'a'])]);

    assert.throws(
      () => new NodeSelector(sparseCatalog).selectNodes(sparseGraph, ['*'], []),
      (error: unknown) => error instanceof CatalogLookupError && error.uniqueId === 'm.X.ghost'
    );
  });

  it('handles long chains without recursion', () => {
    const chain = new DependencyGraph();
    const chainCatalog = new InMemoryResourceCatalog();
    const length = 5000;
    for (let i = 0; i < length; i++) {
      const id = `m.P.n${i}`;
      chain.addNode(id);
      chainCatalog.add(modelNode(id, ['P', `n${i}`]));
      if (i > 0) {
        chain.addEdge(`m.P.n${i - 1}`, id);
      }
    }

    const chainSelector = new NodeSelector(chainCatalog);
    assert.strictEqual(chainSelector.selectNodes(chain, ['n0+'], []).size, length);
    assert.strictEqual(chainSelector.selectNodes(chain, [`+n${length - 1}`], ['n0']).size, length - 1);
  });
});

describe('getPackageNames', () => {
  it('collects the first path segment of every node', () => {
    const { graph, catalog } = buildTreeGraph();
    assert.deepStrictEqual(getPackageNames(graph, catalog), new Set(['X', 'Y']));
  });
});
