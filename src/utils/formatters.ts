import type { Fqn, LsOutputFormat, NodeMetadata } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

export function formatFqn(fqn: Fqn): string {
  return fqn.join('.');
}

/**
 * Format one selected node for `ls` output.
 *
 * @example
 * formatNodeLine(orders, 'name') // => 'shop.staging.orders'
 * formatNodeLine(orders, 'json') // => '{"id":"model.shop.orders",...}'
 */
export function formatNodeLine(node: NodeMetadata, output: LsOutputFormat): string {
  switch (output) {
    case 'id':
      return node.uniqueId;
    case 'name':
      return formatFqn(node.fqn);
    case 'path':
      return node.originalFilePath ?? node.uniqueId;
    case 'json':
      return JSON.stringify({
        id: node.uniqueId,
        name: node.name,
        resource_type: node.kind,
        package_name: node.packageName,
        fqn: node.fqn,
        tags: Array.from(node.tags).sort()
      });
  }
}
