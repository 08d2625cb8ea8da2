/**
 * In-Memory Store Client
 *
 * A StoreClient that keeps nodes, relationships and index entries in
 * maps. Every operation completes without yielding between its read and
 * its write, which makes insertIfAbsent atomic the way the store's
 * uniqueness constraint is.
 */

import type {
  CreatedNode,
  CreateNodeInput,
  Direction,
  IndexHandle,
  IndexInsertStatus,
  IndexTerm,
  StoreClient,
  StoreEntity,
  StoreNode,
  StoreProperties,
  StoreRelationship,
  StoreValue
} from '@/providers/graph/types';
import { GraphClientError, isStoreRelationship } from '@/providers/graph/types';
import { uniqueEntryKey } from '@/providers/graph/utils';

interface StoredNode {
  label: string | undefined;
  properties: StoreProperties;
}

interface IndexEntry {
  key: string;
  value: StoreValue;
  target: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Index
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryIndex implements IndexHandle {
  readonly entries: IndexEntry[] = [];
  /** uniqueEntryKey -> id of the node holding it */
  readonly uniqueKeys = new Map<string, string>();

  constructor(
    private readonly store: MemoryStoreClient,
    readonly name: string
  ) {}

  async insert(key: string, value: StoreValue, target: StoreNode): Promise<void> {
    this.store.requireNode(target.id);
    if (!this.hasEntry(key, value, target.id)) {
      this.entries.push({ key, value, target: target.id });
    }
  }

  async insertIfAbsent(
    key: string,
    value: StoreValue,
    target: StoreNode
  ): Promise<IndexInsertStatus> {
    this.store.requireNode(target.id);
    const uniqueKey = uniqueEntryKey(this.name, key, value);
    const holder = this.uniqueKeys.get(uniqueKey);
    if (holder !== undefined && holder !== target.id) {
      return 'conflict';
    }
    this.uniqueKeys.set(uniqueKey, target.id);
    if (!this.hasEntry(key, value, target.id)) {
      this.entries.push({ key, value, target: target.id });
    }
    return 'inserted';
  }

  async remove(target: StoreNode): Promise<void> {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i]?.target === target.id) {
        this.entries.splice(i, 1);
      }
    }
    for (const [uniqueKey, holder] of this.uniqueKeys) {
      if (holder === target.id) {
        this.uniqueKeys.delete(uniqueKey);
      }
    }
  }

  async query(terms: IndexTerm[]): Promise<StoreNode[]> {
    const targets = [...new Set(this.entries.map((entry) => entry.target))];
    return targets
      .filter((target) =>
        terms.every((term) => this.hasEntry(term.key, term.value, target))
      )
      .map((target) => this.store.snapshot(target));
  }

  entriesFor(target: string): IndexEntry[] {
    return this.entries.filter((entry) => entry.target === target);
  }

  private hasEntry(key: string, value: StoreValue, target: string): boolean {
    return this.entries.some(
      (entry) => entry.key === key && entry.value === value && entry.target === target
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Store Client
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryStoreClient implements StoreClient {
  readonly nodes = new Map<string, StoredNode>();
  readonly relationships = new Map<string, StoreRelationship>();
  readonly indexes = new Map<string, MemoryIndex>();
  /** Category name -> anchor node id */
  readonly categories = new Map<string, string>();
  connected = false;
  schemaInitialized = false;
  private nextId = 1;

  // --- Connection Management ---

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async healthCheck(): Promise<boolean> {
    return this.connected;
  }

  async initializeSchema(): Promise<void> {
    this.schemaInitialized = true;
  }

  // --- Node Operations ---

  async createNode(input: CreateNodeInput): Promise<CreatedNode> {
    if (input.category) {
      this.requireNode(input.category.node.id);
    }
    const id = this.newId('node');
    this.nodes.set(id, { label: input.label, properties: { ...input.properties } });

    const relationship = input.category
      ? this.addRelationship(input.category.node.id, input.category.relationType, id)
      : null;
    return { node: this.snapshot(id), relationship };
  }

  async setProperties(node: StoreNode, properties: StoreProperties): Promise<StoreNode> {
    this.requireNode(node.id).properties = { ...properties };
    return this.snapshot(node.id);
  }

  async getProperties(node: StoreNode): Promise<Record<string, unknown>> {
    return { ...this.requireNode(node.id).properties };
  }

  async delete(entities: StoreEntity[]): Promise<void> {
    const relationships = entities.filter(isStoreRelationship);
    const nodes = entities.filter((entity) => !isStoreRelationship(entity));

    for (const relationship of relationships) {
      this.relationships.delete(relationship.id);
    }
    for (const node of nodes) {
      this.requireNode(node.id);
      const attached = this.relationshipsOf(node.id).length;
      const indexed = [...this.indexes.values()].some((index) => index.entriesFor(node.id).length > 0);
      if (attached > 0 || indexed) {
        throw new GraphClientError(
          `Cannot delete node ${node.id}: it still has relationships`,
          'CONSTRAINT_VIOLATION'
        );
      }
      this.nodes.delete(node.id);
    }
  }

  // --- Index & Category Operations ---

  async getOrCreateIndex(name: string): Promise<IndexHandle> {
    let index = this.indexes.get(name);
    if (!index) {
      index = new MemoryIndex(this, name);
      this.indexes.set(name, index);
    }
    return index;
  }

  async getOrCreateCategory(name: string): Promise<StoreNode> {
    let id = this.categories.get(name);
    if (id === undefined) {
      id = this.newId('category');
      this.nodes.set(id, { label: 'Category', properties: { category: name } });
      this.categories.set(name, id);
    }
    return this.snapshot(id);
  }

  // --- Relationship Operations ---

  async getRelatedNodes(
    node: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<StoreNode[]> {
    const related: string[] = [];
    for (const relationship of this.relationships.values()) {
      if (relationship.type !== relationType) continue;
      const other = otherEnd(relationship, node.id, direction);
      if (other !== null && !related.includes(other)) {
        related.push(other);
      }
    }
    return related.map((id) => this.snapshot(id));
  }

  async hasRelationshipWith(
    node: StoreNode,
    other: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<boolean> {
    const found = await this.getRelationshipsWith(node, other, direction, relationType);
    return found.length > 0;
  }

  async getRelationshipsWith(
    node: StoreNode,
    other: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<StoreRelationship[]> {
    return [...this.relationships.values()].filter(
      (relationship) =>
        relationship.type === relationType &&
        otherEnd(relationship, node.id, direction) === other.id
    );
  }

  async getOrCreateRelationship(
    start: StoreNode,
    relationType: string,
    end: StoreNode
  ): Promise<StoreRelationship> {
    this.requireNode(start.id);
    this.requireNode(end.id);
    for (const relationship of this.relationships.values()) {
      if (
        relationship.type === relationType &&
        relationship.startId === start.id &&
        relationship.endId === end.id
      ) {
        return relationship;
      }
    }
    return this.addRelationship(start.id, relationType, end.id);
  }

  async getRelationships(node: StoreNode): Promise<StoreRelationship[]> {
    return this.relationshipsOf(node.id);
  }

  // --- Test Access ---

  /** Insert a relationship directly, bypassing the MERGE semantics */
  addRelationship(startId: string, type: string, endId: string): StoreRelationship {
    const relationship = { id: this.newId('rel'), type, startId, endId };
    this.relationships.set(relationship.id, relationship);
    return relationship;
  }

  requireNode(id: string): StoredNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new GraphClientError(`Node not found: ${id}`, 'NOT_FOUND');
    }
    return node;
  }

  snapshot(id: string): StoreNode {
    return { id, properties: { ...this.requireNode(id).properties } };
  }

  nodesLabelled(label: string): string[] {
    return [...this.nodes.entries()]
      .filter(([, node]) => node.label === label)
      .map(([id]) => id);
  }

  private relationshipsOf(id: string): StoreRelationship[] {
    return [...this.relationships.values()].filter(
      (relationship) => relationship.startId === id || relationship.endId === id
    );
  }

  private newId(prefix: string): string {
    return `${prefix}:${this.nextId++}`;
  }
}

/** The far end of a relationship seen from `id` in `direction`, or null */
function otherEnd(relationship: StoreRelationship, id: string, direction: Direction): string | null {
  const outgoing = relationship.startId === id;
  const incoming = relationship.endId === id;
  switch (direction) {
    case 'outgoing':
      return outgoing ? relationship.endId : null;
    case 'incoming':
      return incoming ? relationship.startId : null;
    case 'either':
      if (outgoing) return relationship.endId;
      if (incoming) return relationship.startId;
      return null;
  }
}
