/**
 * Neo4j Operations Module
 *
 * Re-exports all operation functions for clean imports.
 */

// Category operations
export { getOrCreateCategory } from './categories';

// Index operations
export { getOrCreateIndex, Neo4jIndexHandle } from './indexes';

// Node operations
export { createNode, deleteEntities, getProperties, setProperties } from './nodes';

// Relationship operations
export {
  getOrCreateRelationship,
  getRelatedNodes,
  getRelationships,
  getRelationshipsWith,
  hasRelationshipWith
} from './relationships';
