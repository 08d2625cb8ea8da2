/**
 * Relationships
 *
 * Schema-level edge declarations and the per-instance managers built
 * from them. A manager caches related objects by remote identity and
 * delegates traversal and edge writes to the store.
 */

import type { Direction, StoreClient, StoreNode, StoreRelationship } from '@/providers/graph/types';
import { MultipleRelationships, NodeNotPersisted, SchemaDefinitionError, TypeMismatch } from './errors';
import type { MappedNode } from './node';

// ============================================================
// CONTEXT
// ============================================================

/**
 * What a manager needs from the object that owns it. The manager holds
 * accessors, not the owning object itself.
 */
export interface RelationshipContext {
  client: StoreClient;
  /** Type name of the owning object */
  originType: string;
  /** Store node of the owning object; throws NodeNotPersisted while transient */
  origin(operation: string): StoreNode;
  /** Rehydrate a store node as an instance of a registered type */
  hydrate(typeName: string, node: StoreNode): MappedNode;
}

// ============================================================
// DEFINITION
// ============================================================

export type RelationshipManagerClass = new (
  name: string,
  definition: RelationshipDefinition,
  context: RelationshipContext
) => RelationshipManager;

export interface RelationshipOptions {
  /** Manager flavor instantiated for each origin object */
  manager?: RelationshipManagerClass;
}

export class RelationshipDefinition {
  readonly manager: RelationshipManagerClass;

  constructor(
    readonly relationType: string,
    readonly targetType: string,
    readonly direction: Direction,
    options: RelationshipOptions = {}
  ) {
    if (relationType.length === 0) {
      throw new SchemaDefinitionError('Relationship types must not be empty');
    }
    if (targetType.length === 0) {
      throw new SchemaDefinitionError(`Relationship ${relationType} needs a target type`);
    }
    this.manager = options.manager ?? RelationshipManager;
    Object.freeze(this);
  }

  buildManager(name: string, context: RelationshipContext): RelationshipManager {
    return new this.manager(name, this, context);
  }
}

export type RelationshipDefinitions = Record<string, RelationshipDefinition>;

/** Outgoing edge: origin -[relationType]-> target */
export function relationshipTo(
  targetType: string,
  relationType: string,
  options?: RelationshipOptions
): RelationshipDefinition {
  return new RelationshipDefinition(relationType, targetType, 'outgoing', options);
}

/** Incoming edge: target -[relationType]-> origin */
export function relationshipFrom(
  targetType: string,
  relationType: string,
  options?: RelationshipOptions
): RelationshipDefinition {
  return new RelationshipDefinition(relationType, targetType, 'incoming', options);
}

/** Edge in either direction; created as origin -> target */
export function relationship(
  targetType: string,
  relationType: string,
  options?: RelationshipOptions
): RelationshipDefinition {
  return new RelationshipDefinition(relationType, targetType, 'either', options);
}

// ============================================================
// MANAGER
// ============================================================

export class RelationshipManager {
  /** Related objects keyed by remote identity */
  protected readonly related = new Map<string, MappedNode>();
  private loaded = false;

  constructor(
    readonly name: string,
    readonly definition: RelationshipDefinition,
    protected readonly context: RelationshipContext
  ) {}

  get relationType(): string {
    return this.definition.relationType;
  }

  get direction(): Direction {
    return this.definition.direction;
  }

  get targetType(): string {
    return this.definition.targetType;
  }

  /**
   * Related objects, in store order on first load.
   *
   * The store is queried while the cache is empty or has never been
   * loaded; afterwards the cache is returned as-is. Objects added by
   * relate() before the first load are kept alongside loaded ones.
   */
  async all(): Promise<MappedNode[]> {
    this.dropDeleted();

    if (!this.loaded || this.related.size === 0) {
      const origin = this.context.origin(`traverse ${this.name}`);
      const nodes = await this.context.client.getRelatedNodes(
        origin,
        this.direction,
        this.relationType
      );
      for (const node of nodes) {
        if (!this.related.has(node.id)) {
          this.related.set(node.id, this.context.hydrate(this.targetType, node));
        }
      }
      this.loaded = nodes.length > 0;
    }

    return [...this.related.values()];
  }

  /**
   * Whether obj is related to the origin.
   *
   * A cache hit answers without asking the store, so an edge removed by
   * another process may still be reported. A miss asks the store and
   * does not populate the cache.
   */
  async isRelated(obj: MappedNode): Promise<boolean> {
    const target = this.targetNode(obj, `check ${this.name}`);
    if (this.related.has(target.id)) return true;

    const origin = this.context.origin(`check ${this.name}`);
    return this.context.client.hasRelationshipWith(
      origin,
      target,
      this.direction,
      this.relationType
    );
  }

  /**
   * Create the edge to obj if it does not exist and cache obj.
   */
  async relate(obj: MappedNode): Promise<StoreRelationship> {
    if (obj.typeName !== this.targetType) {
      throw new TypeMismatch(this.targetType, obj.typeName);
    }
    const target = this.targetNode(obj, `relate to ${this.name}`);
    const origin = this.context.origin(`relate ${this.name}`);

    const edge =
      this.direction === 'incoming'
        ? await this.context.client.getOrCreateRelationship(target, this.relationType, origin)
        : await this.context.client.getOrCreateRelationship(origin, this.relationType, target);

    this.related.set(target.id, obj);
    return edge;
  }

  /**
   * Remove the edge to obj. Does nothing when there is none.
   * @throws MultipleRelationships when more than one edge matches
   */
  async unrelate(obj: MappedNode): Promise<void> {
    const target = this.targetNode(obj, `unrelate from ${this.name}`);
    this.related.delete(target.id);

    const origin = this.context.origin(`unrelate ${this.name}`);
    const edges = await this.context.client.getRelationshipsWith(
      origin,
      target,
      this.direction,
      this.relationType
    );
    if (edges.length > 1) {
      throw new MultipleRelationships(this.relationType, edges.length);
    }
    const [edge] = edges;
    if (!edge) return;

    await this.context.client.delete([edge]);
  }

  private targetNode(obj: MappedNode, operation: string): StoreNode {
    const node = obj.storeNode;
    if (!node) {
      throw new NodeNotPersisted(obj.typeName, operation);
    }
    return node;
  }

  /** Objects deleted in this process no longer have the identity they are keyed by */
  private dropDeleted(): void {
    for (const [id, obj] of this.related) {
      if (obj.id !== id) {
        this.related.delete(id);
      }
    }
  }
}
