/**
 * Neo4j Store Module
 *
 * Modular implementation of the StoreClient interface for Neo4j.
 */

export type { Neo4jConfig } from './client';
// Client (public API)
export { Neo4jStoreClient } from './client';

export type { Label, RelType } from './constants';
// Foundation exports for internal use
export { LABELS, RELS, RETRY, SCHEMA_NAMES } from './constants';
export type { CommandMode } from './errors';
export { classifyNeo4jError, isSchemaAlreadyExistsError, runCommand, withRetry } from './errors';
export type { Neo4jNode, Neo4jRelationship } from './mapping';
export {
  fromNeo4jValue,
  recordToStoreNode,
  recordToStoreRelationship,
  toNeo4jValue
} from './mapping';

// Query repository
export * from './queries';

// Schema management
export { initializeSchema } from './schema';
