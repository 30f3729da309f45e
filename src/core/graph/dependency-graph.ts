/**
 * Dependency graph of resources.
 *
 * Edges point from a dependency to its dependent (producer -> consumer), so
 * ancestors are everything a node needs and descendants everything that
 * consumes it.
 */

import { GraphIntegrityError } from '../../utils/errors.js';

/**
 * Read-only view of a dependency graph used by selection.
 */
export interface DependencyGraphView {
  nodes(): Iterable<string>;
  hasNode(id: string): boolean;
  predecessors(id: string): Iterable<string>;
  successors(id: string): Iterable<string>;
}

export class DependencyGraph implements DependencyGraphView {
  private readonly incoming = new Map<string, Set<string>>();
  private readonly outgoing = new Map<string, Set<string>>();

  addNode(id: string): void {
    if (!this.outgoing.has(id)) {
      this.outgoing.set(id, new Set());
      this.incoming.set(id, new Set());
    }
  }

  /**
   * Record that `dependent` depends on `dependency`. Both nodes must exist.
   */
  addEdge(dependency: string, dependent: string): void {
    const out = this.outgoing.get(dependency);
    const inc = this.incoming.get(dependent);
    if (!out || !inc) {
      const missing = out ? dependent : dependency;
      throw new GraphIntegrityError(
        `Cannot add edge ${dependency} -> ${dependent}: node '${missing}' is not in the graph`,
        { dependency, dependent }
      );
    }
    out.add(dependent);
    inc.add(dependency);
  }

  nodes(): IterableIterator<string> {
    return this.outgoing.keys();
  }

  get size(): number {
    return this.outgoing.size;
  }

  hasNode(id: string): boolean {
    return this.outgoing.has(id);
  }

  predecessors(id: string): Iterable<string> {
    return this.incoming.get(id) ?? [];
  }

  successors(id: string): Iterable<string> {
    return this.outgoing.get(id) ?? [];
  }

  edges(): Array<[string, string]> {
    const result: Array<[string, string]> = [];
    for (const [from, targets] of this.outgoing) {
      for (const to of targets) {
        result.push([from, to]);
      }
    }
    return result;
  }
}

/**
 * Breadth-first reachability from every seed along `next`. Seeds themselves
 * are only included when reachable from another seed.
 */
function reachable(
  seeds: Iterable<string>,
  next: (id: string) => Iterable<string>
): Set<string> {
  const found = new Set<string>();
  const queue: string[] = [];

  for (const seed of seeds) {
    queue.push(seed);
  }

  let head = 0;
  while (head < queue.length) {
    const current = queue[head++];
    for (const neighbor of next(current)) {
      if (!found.has(neighbor)) {
        found.add(neighbor);
        queue.push(neighbor);
      }
    }
  }

  return found;
}

/**
 * All nodes with a directed path into any node of `seeds`.
 */
export function ancestors(graph: DependencyGraphView, seeds: Iterable<string>): Set<string> {
  return reachable(seeds, id => graph.predecessors(id));
}

/**
 * All nodes reachable by a directed path from any node of `seeds`.
 */
export function descendants(graph: DependencyGraphView, seeds: Iterable<string>): Set<string> {
  return reachable(seeds, id => graph.successors(id));
}

/**
 * Detects directed cycles using depth-first search. Returns each cycle as
 * the node path that closes on itself, up to `limit` cycles.
 */
export function findCycles(graph: DependencyGraphView, limit = 20): string[][] {
  const visiting = new Set<string>();
  const visited = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  // Explicit stack of iterators keeps deep chains off the call stack.
  for (const root of graph.nodes()) {
    if (visited.has(root) || cycles.length >= limit) {
      continue;
    }
    const frames: Array<{ id: string; neighbors: Iterator<string> }> = [];
    const enter = (id: string): void => {
      visiting.add(id);
      stack.push(id);
      frames.push({ id, neighbors: graph.successors(id)[Symbol.iterator]() });
    };
    enter(root);

    while (frames.length > 0 && cycles.length < limit) {
      const frame = frames[frames.length - 1];
      const step = frame.neighbors.next();
      if (step.done) {
        visiting.delete(frame.id);
        visited.add(frame.id);
        stack.pop();
        frames.pop();
        continue;
      }
      const neighbor = step.value;
      if (visiting.has(neighbor)) {
        const start = stack.indexOf(neighbor);
        cycles.push(stack.slice(start).concat(neighbor));
      } else if (!visited.has(neighbor)) {
        enter(neighbor);
      }
    }
  }

  return cycles;
}
