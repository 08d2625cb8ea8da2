/**
 * Neo4j Store Client
 *
 * Thin orchestrator that implements the StoreClient interface
 * by delegating to specialized operation modules.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type {
  CreatedNode,
  CreateNodeInput,
  Direction,
  IndexHandle,
  StoreClient,
  StoreEntity,
  StoreNode,
  StoreProperties,
  StoreRelationship
} from '../types';
import { GraphClientError } from '../types';
import { withRetry } from './errors';
import {
  createNode,
  deleteEntities,
  getOrCreateCategory,
  getOrCreateIndex,
  getOrCreateRelationship,
  getProperties,
  getRelatedNodes,
  getRelationships,
  getRelationshipsWith,
  hasRelationshipWith,
  setProperties
} from './operations';
import { initializeSchema } from './schema';

// ============================================================
// CONFIGURATION
// ============================================================

/**
 * Configuration for Neo4j connection.
 * Credentials are optional for servers running with auth disabled.
 */
export interface Neo4jConfig {
  uri: string;
  user?: string;
  password?: string;
  /** Server default database when omitted */
  database?: string;
}

// ============================================================
// CLIENT IMPLEMENTATION
// ============================================================

/**
 * Neo4j implementation of the StoreClient interface.
 *
 * The client owns the driver lifecycle and hands the driver and
 * database to each operation module.
 */
export class Neo4jStoreClient implements StoreClient {
  private _driver: Driver | null = null;
  private readonly config: Neo4jConfig;

  constructor(config: Neo4jConfig) {
    this.config = config;
  }

  /**
   * Get the Neo4j driver instance.
   * Throws if not connected.
   */
  get driver(): Driver {
    if (!this._driver) {
      throw new GraphClientError('Not connected to Neo4j', 'CONNECTION_ERROR');
    }
    return this._driver;
  }

  get database(): string | undefined {
    return this.config.database;
  }

  // ============================================================
  // CONNECTION MANAGEMENT
  // ============================================================

  async connect(): Promise<void> {
    const auth =
      this.config.user !== undefined
        ? neo4j.auth.basic(this.config.user, this.config.password ?? '')
        : undefined;
    this._driver = neo4j.driver(this.config.uri, auth);

    // Fail-fast: verify connectivity on first use
    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      await this.disconnect();
      throw new GraphClientError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${error instanceof Error ? error.message : String(error)}`,
        'CONNECTION_ERROR',
        error instanceof Error ? error : undefined
      );
    }
  }

  async disconnect(): Promise<void> {
    if (this._driver) {
      await this._driver.close();
      this._driver = null;
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this._driver) {
      return false;
    }
    try {
      await this._driver.verifyConnectivity();
      return true;
    } catch {
      return false;
    }
  }

  // ============================================================
  // SCHEMA MANAGEMENT
  // ============================================================

  async initializeSchema(): Promise<void> {
    await withRetry(async () => {
      const session = this.driver.session({ database: this.config.database });
      try {
        await initializeSchema(session);
      } finally {
        await session.close();
      }
    }, 'initializeSchema');
  }

  // ============================================================
  // NODE OPERATIONS
  // ============================================================

  async createNode(input: CreateNodeInput): Promise<CreatedNode> {
    return createNode(this.driver, this.config.database, input);
  }

  async setProperties(node: StoreNode, properties: StoreProperties): Promise<StoreNode> {
    return setProperties(this.driver, this.config.database, node, properties);
  }

  async getProperties(node: StoreNode): Promise<Record<string, unknown>> {
    return getProperties(this.driver, this.config.database, node);
  }

  async delete(entities: StoreEntity[]): Promise<void> {
    return deleteEntities(this.driver, this.config.database, entities);
  }

  // ============================================================
  // INDEX & CATEGORY OPERATIONS
  // ============================================================

  async getOrCreateIndex(name: string): Promise<IndexHandle> {
    return getOrCreateIndex(this.driver, this.config.database, name);
  }

  async getOrCreateCategory(name: string): Promise<StoreNode> {
    return getOrCreateCategory(this.driver, this.config.database, name);
  }

  // ============================================================
  // RELATIONSHIP OPERATIONS
  // ============================================================

  async getRelatedNodes(
    node: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<StoreNode[]> {
    return getRelatedNodes(this.driver, this.config.database, node, direction, relationType);
  }

  async hasRelationshipWith(
    node: StoreNode,
    other: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<boolean> {
    return hasRelationshipWith(
      this.driver,
      this.config.database,
      node,
      other,
      direction,
      relationType
    );
  }

  async getRelationshipsWith(
    node: StoreNode,
    other: StoreNode,
    direction: Direction,
    relationType: string
  ): Promise<StoreRelationship[]> {
    return getRelationshipsWith(
      this.driver,
      this.config.database,
      node,
      other,
      direction,
      relationType
    );
  }

  async getOrCreateRelationship(
    start: StoreNode,
    relationType: string,
    end: StoreNode
  ): Promise<StoreRelationship> {
    return getOrCreateRelationship(this.driver, this.config.database, start, relationType, end);
  }

  async getRelationships(node: StoreNode): Promise<StoreRelationship[]> {
    return getRelationships(this.driver, this.config.database, node);
  }
}
