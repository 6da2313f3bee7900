/**
 * Key Structure Builder
 * Derives partition/clustering keys and the CQL clauses built from them
 */

import { ConfigurationError } from '@cqlgen/shared';
import type { ColumnDefinition, KeyStructure } from './types.js';

function equality(keys: readonly string[]): string {
  return keys.map((k) => `${k}=?`).join(' AND ');
}

/**
 * Build the key structure for a table. A table without a partition key
 * cannot be stored and fails with a ConfigurationError.
 */
export function buildKeyStructure(table: string, columns: readonly ColumnDefinition[]): KeyStructure {
  const partitionKeys: string[] = [];
  const clusteringKeys: string[] = [];
  const clusteringOrder: string[] = [];
  const allKeys: string[] = [];

  for (const column of columns) {
    switch (column.keyRole) {
      case 'partition':
        partitionKeys.push(column.name);
        allKeys.push(column.name);
        break;
      case 'cluster':
      case 'cluster-asc':
      case 'cluster-desc':
        clusteringKeys.push(column.name);
        allKeys.push(column.name);
        break;
      case 'none':
        break;
    }

    if (column.keyRole === 'cluster-asc') {
      clusteringOrder.push(`${column.name} ASC`);
    } else if (column.keyRole === 'cluster-desc') {
      clusteringOrder.push(`${column.name} DESC`);
    }
  }

  if (partitionKeys.length === 0) {
    throw new ConfigurationError(`Table ${table} has no partition key`, { table });
  }

  // Composite partition keys need their own parentheses inside PRIMARY KEY (...)
  const partitionKeyClause =
    partitionKeys.length === 1 ? partitionKeys.join('') : `(${partitionKeys.join(', ')})`;

  return {
    partitionKeys,
    clusteringKeys,
    clusteringOrder,
    allKeys,
    partitionKeyClause,
    clusteringColumnsClause: clusteringKeys.length === 0 ? '' : `, ${clusteringKeys.join(', ')}`,
    clusteringOrderClause:
      clusteringOrder.length === 0 ? '' : `WITH CLUSTERING ORDER BY (${clusteringOrder.join(', ')})`,
    allKeysClause: allKeys.join(', '),
    allKeysEquality: equality(allKeys),
    partitionKeysClause: partitionKeys.join(', '),
    partitionKeysEquality: equality(partitionKeys),
  };
}
