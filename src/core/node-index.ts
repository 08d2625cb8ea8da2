/**
 * Node Index
 *
 * Keeps a type's secondary index in step with its nodes and answers
 * equality queries against it. Unique properties go through the store's
 * conditional insert; nothing here re-checks uniqueness locally.
 */

import type { IndexTerm, StoreNode, StoreProperties } from '@/providers/graph/types';
import { MultipleResults, NotFound, NotUnique, PropertyNotIndexed } from './errors';
import type { MappedNode } from './node';
import type { RelationshipDefinitions } from './relationships';
import type { SchemaEntry } from './schema';
import type { PropertyMap } from './types';

// ============================================================
// INDEX MAINTENANCE
// ============================================================

/**
 * Write index entries for every indexed property of a node.
 *
 * Unique properties are inserted only if absent. The first conflict
 * stops the update; entries written before it stay in place for the
 * caller to clean up.
 *
 * @throws NotUnique naming the conflicting property
 */
export async function indexNode(
  entry: SchemaEntry,
  node: StoreNode,
  properties: StoreProperties
): Promise<void> {
  for (const [name, value] of Object.entries(properties)) {
    const descriptor = entry.property(name);

    if (descriptor.isUnique) {
      const status = await entry.index.insertIfAbsent(name, value, node);
      if (status === 'conflict') {
        throw new NotUnique(entry.typeName, name, value);
      }
    } else if (descriptor.isIndexed) {
      await entry.index.insert(name, value, node);
    }
  }
}

/**
 * Remove every entry of the node from its type's index.
 */
export async function unindexNode(entry: SchemaEntry, node: StoreNode): Promise<void> {
  await entry.index.remove(node);
}

// ============================================================
// QUERY FACADE
// ============================================================

export class NodeIndex<
  P extends PropertyMap = PropertyMap,
  R extends RelationshipDefinitions = RelationshipDefinitions
> {
  constructor(private readonly entry: SchemaEntry) {}

  get name(): string {
    return this.entry.index.name;
  }

  /**
   * Nodes whose indexed properties equal every value in the predicate.
   * Undefined values are ignored; an empty predicate matches every
   * indexed node of the type.
   *
   * @throws NoSuchProperty for an undeclared property
   * @throws PropertyNotIndexed for a declared but unindexed property
   * @throws InvalidType for a value of the wrong kind
   */
  async search(predicate: P): Promise<MappedNode<P, R>[]> {
    const terms: IndexTerm[] = [];

    for (const [key, value] of Object.entries(predicate)) {
      if (value === undefined) continue;
      const descriptor = this.entry.property(key);
      if (!descriptor.isIndexed) {
        throw new PropertyNotIndexed(this.entry.typeName, key);
      }
      terms.push({ key, value: descriptor.validate(value) });
    }

    const nodes = await this.entry.index.query(terms);
    return nodes.map((node) => this.entry.hydrate<P, R>(node));
  }

  /**
   * The single node matching the predicate.
   *
   * @throws NotFound when nothing matches
   * @throws MultipleResults when more than one node matches
   */
  async get(predicate: P): Promise<MappedNode<P, R>> {
    const nodes = await this.search(predicate);
    const [node] = nodes;
    if (!node) {
      throw new NotFound(this.entry.typeName);
    }
    if (nodes.length > 1) {
      throw new MultipleResults(this.entry.typeName, nodes.length);
    }
    return node;
  }
}
