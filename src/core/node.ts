/**
 * Mapped Node
 *
 * An instance of a registered node type. Property values live in memory
 * until save(); the first save creates the store node, links it to the
 * type's category anchor and writes its index entries. Later saves
 * overwrite the stored properties and rebuild the entries.
 */

import type { StoreNode, StoreProperties, StoreRelationship } from '@/providers/graph/types';
import { categoryRelationType } from '@/providers/graph/utils';
import {
  logNodeCreated,
  logNodeDeleted,
  logNodeUpdated,
  logUniqueRollback,
  logUpdateConflict
} from '@/utils/logger';
import { NodeNotPersisted, NoSuchRelationship, NotUnique } from './errors';
import { indexNode, unindexNode } from './node-index';
import { assertProperties } from './properties';
import type { RelationshipDefinitions, RelationshipManager } from './relationships';
import type { SchemaEntry } from './schema';
import type { PropertyMap, PropertyValue } from './types';

export class MappedNode<
  P extends PropertyMap = PropertyMap,
  R extends RelationshipDefinitions = RelationshipDefinitions
> {
  private _node: StoreNode | null = null;
  private values: P;
  private readonly managers = new Map<string, RelationshipManager>();

  /**
   * Prefer NodeType.create(); this is also the hydration path, so it
   * does not touch the store.
   *
   * @throws NoSuchProperty or InvalidType for a bad initial value
   */
  constructor(
    private readonly entry: SchemaEntry,
    initial: P
  ) {
    assertProperties<P>(entry, initial);
    this.values = { ...initial };

    const context = {
      client: entry.client,
      originType: entry.typeName,
      origin: (operation: string) => this.requireNode(operation),
      hydrate: (typeName: string, node: StoreNode) => entry.registry.get(typeName).hydrate(node)
    };
    for (const [name, definition] of Object.entries(entry.relationships)) {
      this.managers.set(name, definition.buildManager(name, context));
    }
  }

  get typeName(): string {
    return this.entry.typeName;
  }

  /** Remote identity; null until the first save and after delete */
  get id(): string | null {
    return this._node?.id ?? null;
  }

  get storeNode(): StoreNode | null {
    return this._node;
  }

  get isPersisted(): boolean {
    return this._node !== null;
  }

  /** Snapshot of the current in-memory values */
  get properties(): Readonly<P> {
    return { ...this.values };
  }

  // ============================================================
  // PROPERTY ACCESS
  // ============================================================

  /**
   * @throws NoSuchProperty for an undeclared name
   */
  get(name: string): PropertyValue | undefined {
    this.entry.property(name);
    return this.values[name];
  }

  /**
   * Assign a value after validating it against the declared kind.
   * Nothing is written until save().
   *
   * @throws NoSuchProperty for an undeclared name
   * @throws InvalidType when the value does not match the kind
   */
  set(name: string, value: unknown): this {
    const valid = this.entry.property(name).validate(value);
    this.values = { ...this.values, [name]: valid };
    return this;
  }

  /**
   * Clear a value. The property is removed from the store on the next save.
   */
  unset(name: string): this {
    this.entry.property(name);
    this.values = { ...this.values, [name]: undefined };
    return this;
  }

  // ============================================================
  // RELATIONSHIPS
  // ============================================================

  /**
   * Manager for a declared relationship. Managers live as long as the
   * object, so their cache is shared by every call.
   *
   * @throws NoSuchRelationship for an undeclared name
   */
  rel(name: keyof R & string): RelationshipManager {
    const manager = this.managers.get(name);
    if (!manager) {
      throw new NoSuchRelationship(this.typeName, name);
    }
    return manager;
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /**
   * Persist the current values.
   *
   * On first save a uniqueness conflict removes everything written so
   * far and leaves the object transient. On later saves the stored
   * properties keep the new values even when a conflict is raised.
   *
   * @throws NotUnique when a uniquely indexed value is already taken
   */
  async save(): Promise<this> {
    const properties = this.storeProperties();
    return this._node ? this.update(this._node, properties) : this.create(properties);
  }

  /**
   * Remove the node, its index entries and every attached relationship.
   * The object becomes transient again and keeps its values.
   *
   * @throws NodeNotPersisted when the object was never saved
   */
  async delete(): Promise<boolean> {
    const node = this.requireNode('delete');
    const client = this.entry.client;

    await unindexNode(this.entry, node);
    const relationships = await client.getRelationships(node);
    await client.delete([...relationships, node]);

    this._node = null;
    logNodeDeleted(this.typeName, node.id, relationships.length);
    return true;
  }

  /**
   * Replace the in-memory values with what the store holds.
   *
   * @throws NodeNotPersisted when the object was never saved
   */
  async refresh(): Promise<this> {
    const node = this.requireNode('refresh');
    const stored = await this.entry.client.getProperties(node);
    assertProperties<P>(this.entry, stored);
    this.values = stored;
    this._node = { id: node.id, properties: stored };
    return this;
  }

  /** @internal Bind to an existing store node without writing */
  attach(node: StoreNode): this {
    this._node = node;
    return this;
  }

  private async create(properties: StoreProperties): Promise<this> {
    const client = this.entry.client;
    const category = await this.entry.adapter.category(this.typeName);
    const { node, relationship } = await client.createNode({
      label: this.typeName,
      properties,
      category: { node: category, relationType: categoryRelationType(this.typeName) }
    });
    this._node = node;

    try {
      await indexNode(this.entry, node, properties);
    } catch (error) {
      await this.rollback(node, relationship, error);
      if (error instanceof NotUnique) {
        logUniqueRollback(this.typeName, error.property);
      }
      throw error;
    }

    logNodeCreated(this.typeName, node.id);
    return this;
  }

  private async update(current: StoreNode, properties: StoreProperties): Promise<this> {
    const node = await this.entry.client.setProperties(current, properties);
    this._node = node;

    await unindexNode(this.entry, node);
    try {
      await indexNode(this.entry, node, properties);
    } catch (error) {
      if (error instanceof NotUnique) {
        logUpdateConflict(this.typeName, node.id, error.property);
      }
      throw error;
    }

    logNodeUpdated(this.typeName, node.id);
    return this;
  }

  /** Undo a partial first save */
  private async rollback(
    node: StoreNode,
    relationship: StoreRelationship | null,
    cause: unknown
  ): Promise<void> {
    try {
      await unindexNode(this.entry, node);
      await this.entry.client.delete(relationship ? [relationship, node] : [node]);
    } catch (rollbackError) {
      throw new AggregateError(
        [cause, rollbackError],
        `Saving ${this.typeName} failed and the partial node could not be removed`
      );
    }
    this._node = null;
  }

  private storeProperties(): StoreProperties {
    const properties: StoreProperties = {};
    for (const [name, value] of Object.entries(this.values)) {
      if (value !== undefined) {
        properties[name] = value;
      }
    }
    return properties;
  }

  private requireNode(operation: string): StoreNode {
    if (!this._node) {
      throw new NodeNotPersisted(this.typeName, operation);
    }
    return this._node;
  }
}
