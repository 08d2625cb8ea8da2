/**
 * Graph Store Types
 *
 * Defines the contract the mapping core uses to talk to a graph store.
 * The core never touches a driver directly: nodes, relationships and
 * index entries all go through a StoreClient.
 */

// ============================================================
// ERROR TYPES
// ============================================================

/**
 * Standard error types that any store implementation must map to.
 * This allows callers to handle store failures consistently
 * regardless of the underlying database.
 */
export type GraphErrorType =
  | 'CONNECTION_ERROR' // Failed to connect to database
  | 'CONSTRAINT_VIOLATION' // Unique constraint violated
  | 'NOT_FOUND' // Node/edge not found
  | 'QUERY_ERROR' // Invalid query or execution error
  | 'TRANSIENT_ERROR'; // Temporary failure (retry possible)

/**
 * Standardized error class for store operations.
 * All store client implementations should throw this error type.
 */
export class GraphClientError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: GraphErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'GraphClientError';
    this.cause = cause;
  }

  /**
   * Whether this error is retryable (transient failures).
   */
  get retryable(): boolean {
    return this.type === 'TRANSIENT_ERROR';
  }
}

// ============================================================
// ENTITY TYPES
// ============================================================

/**
 * Traversal direction relative to the node a query starts from.
 */
export const DIRECTIONS = ['outgoing', 'incoming', 'either'] as const;

export type Direction = (typeof DIRECTIONS)[number];

/**
 * Scalar values the store persists as node properties or index values.
 */
export type StoreValue = string | number | boolean;

export type StoreProperties = Record<string, StoreValue>;

/**
 * A node as seen by the core: its remote identity and raw properties.
 * Properties are untyped here; the schema layer validates them.
 */
export interface StoreNode {
  id: string;
  properties: Record<string, unknown>;
}

export interface StoreRelationship {
  id: string;
  type: string;
  startId: string;
  endId: string;
}

export type StoreEntity = StoreNode | StoreRelationship;

export function isStoreRelationship(entity: StoreEntity): entity is StoreRelationship {
  return 'type' in entity && 'startId' in entity;
}

/**
 * Input for creating a node, optionally linked from a category anchor.
 */
export interface CreateNodeInput {
  label?: string;
  properties: StoreProperties;
  category?: {
    node: StoreNode;
    relationType: string;
  };
}

export interface CreatedNode {
  node: StoreNode;
  /** Category edge, or null when no category was requested */
  relationship: StoreRelationship | null;
}

// ============================================================
// INDEX TYPES
// ============================================================

/**
 * Outcome of a conditional index insert.
 *
 * - inserted: the entry now belongs to the target (or already did)
 * - conflict: another node holds the entry; nothing was written
 */
export type IndexInsertStatus = 'inserted' | 'conflict';

/**
 * One equality term of an index query. Terms are AND-composed.
 */
export interface IndexTerm {
  key: string;
  value: StoreValue;
}

/**
 * Handle to a named secondary index in the store.
 */
export interface IndexHandle {
  readonly name: string;

  insert(key: string, value: StoreValue, target: StoreNode): Promise<void>;

  /**
   * Atomic "only if absent" insert. This is the sole enforcement
   * point for unique indexing.
   */
  insertIfAbsent(key: string, value: StoreValue, target: StoreNode): Promise<IndexInsertStatus>;

  /** Remove every entry in this index that points at the target */
  remove(target: StoreNode): Promise<void>;

  /** Nodes matching all terms; every indexed node when terms is empty */
  query(terms: IndexTerm[]): Promise<StoreNode[]>;
}

// ============================================================
// STORE CLIENT INTERFACE
// ============================================================

/**
 * Store Client Interface
 *
 * The operations the mapping core consumes. Single operations are
 * assumed atomic at node level; multi-step sequences are not.
 */
export interface StoreClient {
  // --- Connection Management ---
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;

  // --- Schema Management ---
  initializeSchema(): Promise<void>;

  // --- Node Operations ---
  createNode(input: CreateNodeInput): Promise<CreatedNode>;
  setProperties(node: StoreNode, properties: StoreProperties): Promise<StoreNode>;
  getProperties(node: StoreNode): Promise<Record<string, unknown>>;

  /** Delete relationships and nodes in one go; relationships first */
  delete(entities: StoreEntity[]): Promise<void>;

  // --- Index Operations ---
  getOrCreateIndex(name: string): Promise<IndexHandle>;

  // --- Category Operations ---
  getOrCreateCategory(name: string): Promise<StoreNode>;

  // --- Relationship Operations ---
  getRelatedNodes(node: StoreNode, direction: Direction, relationType: string): Promise<StoreNode[]>;
  hasRelationshipWith(
    node: StoreNode,
    other: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<boolean>;
  getRelationshipsWith(
    node: StoreNode,
    other: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<StoreRelationship[]>;
  getOrCreateRelationship(
    start: StoreNode,
    relationType: string,
    end: StoreNode
  ): Promise<StoreRelationship>;

  /** Every relationship incident to the node, any type or direction */
  getRelationships(node: StoreNode): Promise<StoreRelationship[]>;
}
