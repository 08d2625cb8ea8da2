/**
 * Schema Registry
 *
 * Binds node type names to their property descriptors, relationship
 * definitions and dedicated index. Registration is the only way a type
 * comes into existence; entries are frozen once registered.
 */

import type { IndexHandle, StoreClient, StoreNode } from '@/providers/graph/types';
import { categoryRelationType } from '@/providers/graph/utils';
import { logTypeRegistered } from '@/utils/logger';
import type { ConnectionAdapter } from './connection';
import { NoSuchProperty, SchemaDefinitionError, UnknownNodeType } from './errors';
import { MappedNode } from './node';
import { NodeIndex } from './node-index';
import {
  type AnyPropertyDescriptor,
  assertProperties,
  type PropertiesOf,
  type PropertyLookup
} from './properties';
import type { RelationshipDefinitions } from './relationships';
import type { PropertyMap } from './types';

// ============================================================
// DEFINITIONS
// ============================================================

export interface NodeDefinition<
  D extends readonly AnyPropertyDescriptor[],
  R extends RelationshipDefinitions
> {
  name: string;
  properties: D;
  relationships?: R;
}

// ============================================================
// SCHEMA ENTRY
// ============================================================

export class SchemaEntry implements PropertyLookup {
  readonly properties: ReadonlyMap<string, AnyPropertyDescriptor>;
  readonly relationships: Readonly<RelationshipDefinitions>;

  constructor(
    readonly typeName: string,
    properties: readonly AnyPropertyDescriptor[],
    relationships: RelationshipDefinitions,
    readonly index: IndexHandle,
    readonly registry: SchemaRegistry
  ) {
    this.properties = new Map(properties.map((descriptor) => [descriptor.name, descriptor]));
    this.relationships = Object.freeze({ ...relationships });
    Object.freeze(this);
  }

  get adapter(): ConnectionAdapter {
    return this.registry.adapter;
  }

  get client(): StoreClient {
    return this.registry.adapter.client;
  }

  /**
   * @throws NoSuchProperty for an undeclared name
   */
  property(name: string): AnyPropertyDescriptor {
    const descriptor = this.properties.get(name);
    if (!descriptor) {
      throw new NoSuchProperty(this.typeName, name);
    }
    return descriptor;
  }

  /**
   * Rebuild a persisted object from its store node. Stored values are
   * validated like user input.
   */
  hydrate<
    P extends PropertyMap = PropertyMap,
    R extends RelationshipDefinitions = RelationshipDefinitions
  >(node: StoreNode): MappedNode<P, R> {
    const values = { ...node.properties };
    assertProperties<P>(this, values);
    return new MappedNode<P, R>(this, values).attach(node);
  }
}

// ============================================================
// NODE TYPE
// ============================================================

/**
 * Typed handle returned by register().
 */
export class NodeType<
  P extends PropertyMap = PropertyMap,
  R extends RelationshipDefinitions = RelationshipDefinitions
> {
  readonly index: NodeIndex<P, R>;

  constructor(readonly entry: SchemaEntry) {
    this.index = new NodeIndex<P, R>(entry);
  }

  get name(): string {
    return this.entry.typeName;
  }

  /**
   * A new transient object. Nothing is written until save().
   *
   * @throws NoSuchProperty or InvalidType before any value is assigned
   */
  create(initial: P): MappedNode<P, R> {
    return new MappedNode<P, R>(this.entry, initial);
  }

  /**
   * @throws NoSuchProperty for an undeclared name
   */
  getProperty(name: string): AnyPropertyDescriptor {
    return this.entry.property(name);
  }

  /**
   * Every saved instance, found through the type's category anchor.
   */
  async all(): Promise<MappedNode<P, R>[]> {
    const anchor = await this.entry.adapter.category(this.name);
    const nodes = await this.entry.client.getRelatedNodes(
      anchor,
      'outgoing',
      categoryRelationType(this.name)
    );
    return nodes.map((node) => this.entry.hydrate<P, R>(node));
  }
}

// ============================================================
// REGISTRY
// ============================================================

export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  /** Names whose registration is awaiting its index */
  private readonly pending = new Set<string>();

  constructor(readonly adapter: ConnectionAdapter) {}

  /**
   * Register a node type and obtain its index from the store.
   *
   * @throws SchemaDefinitionError for an invalid or repeated definition
   */
  async register<
    D extends readonly AnyPropertyDescriptor[],
    R extends RelationshipDefinitions = Record<never, never>
  >(definition: NodeDefinition<D, R>): Promise<NodeType<PropertiesOf<D>, R>> {
    const { name } = definition;
    const relationships: RelationshipDefinitions = definition.relationships ?? {};
    this.checkDefinition(name, definition.properties, relationships);

    this.pending.add(name);
    try {
      const index = await this.adapter.client.getOrCreateIndex(name);
      const entry = new SchemaEntry(name, definition.properties, relationships, index, this);
      this.entries.set(name, entry);
      logTypeRegistered(name, entry.properties.size);
      return new NodeType<PropertiesOf<D>, R>(entry);
    } finally {
      this.pending.delete(name);
    }
  }

  /**
   * @throws UnknownNodeType for an unregistered name
   */
  get(typeName: string): SchemaEntry {
    const entry = this.entries.get(typeName);
    if (!entry) {
      throw new UnknownNodeType(typeName);
    }
    return entry;
  }

  has(typeName: string): boolean {
    return this.entries.has(typeName);
  }

  /**
   * @throws UnknownNodeType or NoSuchProperty
   */
  getProperty(typeName: string, name: string): AnyPropertyDescriptor {
    return this.get(typeName).property(name);
  }

  get typeNames(): string[] {
    return [...this.entries.keys()];
  }

  private checkDefinition(
    name: string,
    properties: readonly AnyPropertyDescriptor[],
    relationships: RelationshipDefinitions
  ): void {
    if (name.length === 0) {
      throw new SchemaDefinitionError('Node type names must not be empty');
    }
    if (this.entries.has(name) || this.pending.has(name)) {
      throw new SchemaDefinitionError(`Node type '${name}' is already registered`);
    }

    const seen = new Set<string>();
    for (const descriptor of properties) {
      if (seen.has(descriptor.name)) {
        throw new SchemaDefinitionError(`${name} declares property '${descriptor.name}' twice`);
      }
      seen.add(descriptor.name);
    }

    for (const relationName of Object.keys(relationships)) {
      if (seen.has(relationName)) {
        throw new SchemaDefinitionError(
          `${name}: relationship '${relationName}' collides with a property of the same name`
        );
      }
    }
  }
}
