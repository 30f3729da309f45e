import type { NodeMetadata } from '../../types/index.js';
import { CatalogLookupError, GraphIntegrityError } from '../../utils/errors.js';

/**
 * Maps node identifiers to the metadata selection reads.
 */
export interface ResourceCatalog {
  get(uniqueId: string): NodeMetadata | undefined;
  /** Like get(), but a miss is an error */
  lookup(uniqueId: string): NodeMetadata;
  values(): Iterable<NodeMetadata>;
}

export class InMemoryResourceCatalog implements ResourceCatalog {
  private readonly entries = new Map<string, NodeMetadata>();

  constructor(nodes: Iterable<NodeMetadata> = []) {
    for (const node of nodes) {
      this.add(node);
    }
  }

  add(node: NodeMetadata): void {
    if (this.entries.has(node.uniqueId)) {
      throw new GraphIntegrityError(`Duplicate resource identifier '${node.uniqueId}'`, {
        uniqueId: node.uniqueId,
        files: [this.entries.get(node.uniqueId)?.originalFilePath, node.originalFilePath]
      });
    }
    this.entries.set(node.uniqueId, node);
  }

  get(uniqueId: string): NodeMetadata | undefined {
    return this.entries.get(uniqueId);
  }

  lookup(uniqueId: string): NodeMetadata {
    const node = this.entries.get(uniqueId);
    if (!node) {
      throw new CatalogLookupError(uniqueId);
    }
    return node;
  }

  values(): IterableIterator<NodeMetadata> {
    return this.entries.values();
  }

  get size(): number {
    return this.entries.size;
  }
}
