/**
 * Connection Adapter
 *
 * Owns the store client and the category anchor cache. The process-wide
 * adapter is created lazily on first use; an explicitly built adapter
 * serves tests and applications that manage their own client.
 */

import { type Config, ConfigError, getConfig } from '@/config';
import { createStoreClient } from '@/providers/graph/factory';
import { GraphClientError, type StoreClient, type StoreNode } from '@/providers/graph/types';
import { logConnected, logConnectionFailed, logDisconnected, setLogLevel } from '@/utils/logger';
import { SchemaRegistry } from './schema';

export class ConnectionAdapter {
  readonly registry: SchemaRegistry;
  /** In-flight and settled anchor lookups, keyed by type name */
  private readonly categories = new Map<string, Promise<StoreNode>>();

  constructor(readonly client: StoreClient) {
    this.registry = new SchemaRegistry(this);
  }

  /**
   * Anchor node for a type, created on first request. Concurrent callers
   * share one lookup; a failed lookup is retried by the next caller.
   */
  async category(name: string): Promise<StoreNode> {
    let pending = this.categories.get(name);
    if (!pending) {
      pending = this.client.getOrCreateCategory(name);
      this.categories.set(name, pending);
    }

    try {
      return await pending;
    } catch (error) {
      if (this.categories.get(name) === pending) {
        this.categories.delete(name);
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    this.categories.clear();
    await this.client.disconnect();
  }
}

// ============================================================
// PROCESS-WIDE ADAPTER
// ============================================================

/** Cached adapter instance */
let adapter: ConnectionAdapter | null = null;
let initPromise: Promise<ConnectionAdapter> | null = null;

/**
 * Get the shared adapter, connecting on first call.
 *
 * @throws GraphClientError with type CONNECTION_ERROR when the config is
 * missing or invalid, or the server cannot be reached
 */
export async function getConnectionAdapter(): Promise<ConnectionAdapter> {
  if (adapter) return adapter;

  if (!initPromise) {
    initPromise = initializeAdapter();
  }

  const pending = initPromise;
  let ready: ConnectionAdapter;
  try {
    ready = await pending;
  } catch (error) {
    if (initPromise === pending) initPromise = null;
    throw error;
  }

  // closeConnectionAdapter() ran while this call was waiting
  if (initPromise !== pending) {
    throw new GraphClientError('Connection was closed during initialization', 'CONNECTION_ERROR');
  }
  adapter = ready;
  return adapter;
}

/**
 * Disconnect the shared adapter. The next getConnectionAdapter() call
 * connects again. An initialization that failed has nothing to close.
 */
export async function closeConnectionAdapter(): Promise<void> {
  const pending = initPromise;
  adapter = null;
  initPromise = null;
  if (!pending) return;

  let current: ConnectionAdapter;
  try {
    current = await pending;
  } catch {
    // already rejected to the caller that started it
    return;
  }
  await current.close();
  logDisconnected();
}

function readConfig(): Config {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new GraphClientError(`Cannot connect: ${error.message}`, 'CONNECTION_ERROR', error);
    }
    throw error;
  }
}

async function initializeAdapter(): Promise<ConnectionAdapter> {
  const config = readConfig();
  if (config.logging?.level) {
    setLogLevel(config.logging.level);
  }

  const client = createStoreClient(config.neo4j);
  try {
    await client.connect();
    await client.initializeSchema();
  } catch (error) {
    await client.disconnect();
    if (error instanceof Error) logConnectionFailed(error);
    throw error;
  }

  logConnected(config.neo4j.uri, config.neo4j.database);
  return new ConnectionAdapter(client);
}
