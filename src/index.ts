/**
 * Cartograph
 *
 * Typed object-graph mapping for Neo4j.
 */

export * from './core';

export {
  type Config,
  ConfigError,
  type ConfigInput,
  getConfig,
  loadConfig,
  parseConfig,
  resetConfig
} from './config';

export {
  createStoreClient,
  type Direction,
  GraphClientError,
  type GraphErrorType,
  type IndexHandle,
  type IndexInsertStatus,
  type IndexTerm,
  type Neo4jConfig,
  Neo4jStoreClient,
  type StoreClient,
  type StoreEntity,
  type StoreNode,
  type StoreProperties,
  type StoreRelationship,
  type StoreValue
} from './providers/graph';

export { getLogLevel, LOG_LEVELS, type LogLevel, setColorEnabled, setLogLevel } from './utils';
