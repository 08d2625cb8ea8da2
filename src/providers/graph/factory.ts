/**
 * Store Client Factory
 *
 * Creates store clients. Currently only supports Neo4j.
 */

import { type Neo4jConfig, Neo4jStoreClient } from './neo4j';
import type { StoreClient } from './types';

export function createStoreClient(config: Neo4jConfig): StoreClient {
  return new Neo4jStoreClient(config);
}
