/**
 * Graph Provider Module
 *
 * Exports the StoreClient interface and Neo4j implementation.
 */

// Factory
export { createStoreClient } from './factory';

// Neo4j implementation
export type { Neo4jConfig } from './neo4j';
export { Neo4jStoreClient } from './neo4j';

// Types
export type {
  CreatedNode,
  CreateNodeInput,
  Direction,
  GraphErrorType,
  IndexHandle,
  IndexInsertStatus,
  IndexTerm,
  StoreClient,
  StoreEntity,
  StoreNode,
  StoreProperties,
  StoreRelationship,
  StoreValue
} from './types';
export { DIRECTIONS, GraphClientError, isStoreRelationship } from './types';

// Utilities
export { categoryRelationType, escapeIdentifier, uniqueEntryKey } from './utils';
