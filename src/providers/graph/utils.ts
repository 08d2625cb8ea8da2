/**
 * Graph Provider Utilities
 *
 * Helper functions for the Neo4j store client.
 */

import type { StoreValue } from './types';

/**
 * Quote a label or relationship type for interpolation into Cypher.
 * Labels and types cannot be parameterized, so every dynamic name
 * goes through here.
 *
 * @see https://neo4j.com/docs/cypher-manual/current/syntax/naming/
 */
export function escapeIdentifier(name: string): string {
  if (name.length === 0) {
    throw new Error('Cypher identifiers must not be empty');
  }
  return `\`${name.replace(/`/g, '``')}\``;
}

/**
 * Key identifying one (index, key, value) slot of a unique index.
 * The value's runtime type is part of the key so "1" and 1 never collide.
 */
export function uniqueEntryKey(index: string, key: string, value: StoreValue): string {
  return JSON.stringify([index, key, typeof value, value]);
}

/**
 * Relationship type linking a category anchor to instances of a type.
 */
export function categoryRelationType(typeName: string): string {
  return typeName.toUpperCase();
}
