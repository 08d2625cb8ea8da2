/**
 * Neo4j Index Operations
 *
 * Named secondary indexes stored as IndexEntry nodes. Each entry holds
 * (index, key, value) and an INDEXES edge to the node it points at.
 * Entries of unique properties also carry a constrained uniqueKey.
 */

import type { Driver } from 'neo4j-driver';
import type { IndexHandle, IndexInsertStatus, IndexTerm, StoreNode, StoreValue } from '../../types';
import { GraphClientError } from '../../types';
import { uniqueEntryKey } from '../../utils';
import { runCommand } from '../errors';
import { recordToStoreNode, toNeo4jValue } from '../mapping';
import {
  buildIndexQuery,
  GET_OR_CREATE_INDEX,
  INDEX_INSERT,
  INDEX_INSERT_IF_ABSENT,
  INDEX_REMOVE
} from '../queries';

// ============================================================
// INDEX HANDLE
// ============================================================

export class Neo4jIndexHandle implements IndexHandle {
  constructor(
    private readonly driver: Driver,
    private readonly database: string | undefined,
    readonly name: string
  ) {}

  async insert(key: string, value: StoreValue, target: StoreNode): Promise<void> {
    return runCommand(
      this.driver,
      this.database,
      'write',
      async (session) => {
        await session.executeWrite(async (tx) =>
          tx.run(INDEX_INSERT, {
            index: this.name,
            key,
            value: toNeo4jValue(value),
            target: target.id
          })
        );
      },
      'index.insert'
    );
  }

  async insertIfAbsent(
    key: string,
    value: StoreValue,
    target: StoreNode
  ): Promise<IndexInsertStatus> {
    return runCommand(
      this.driver,
      this.database,
      'write',
      async (session) => {
        const result = await session.executeWrite(async (tx) =>
          tx.run(INDEX_INSERT_IF_ABSENT, {
            index: this.name,
            key,
            value: toNeo4jValue(value),
            target: target.id,
            uniqueKey: uniqueEntryKey(this.name, key, value)
          })
        );
        const record = result.records[0];
        if (!record) {
          throw new GraphClientError(`Index target not found: ${target.id}`, 'NOT_FOUND');
        }
        return record.get('inserted') === true ? 'inserted' : 'conflict';
      },
      'index.insertIfAbsent'
    );
  }

  async remove(target: StoreNode): Promise<void> {
    return runCommand(
      this.driver,
      this.database,
      'write',
      async (session) => {
        await session.executeWrite(async (tx) =>
          tx.run(INDEX_REMOVE, { index: this.name, target: target.id })
        );
      },
      'index.remove'
    );
  }

  async query(terms: IndexTerm[]): Promise<StoreNode[]> {
    const { cypher, params } = buildIndexQuery(this.name, terms, toNeo4jValue);

    return runCommand(
      this.driver,
      this.database,
      'read',
      async (session) => {
        const result = await session.run(cypher, params);
        return result.records.map((r) => recordToStoreNode(r.get('n')));
      },
      'index.query'
    );
  }
}

// ============================================================
// INDEX LOOKUP
// ============================================================

/**
 * Record the index in the store (idempotent) and return a handle to it.
 */
export async function getOrCreateIndex(
  driver: Driver,
  database: string | undefined,
  name: string
): Promise<IndexHandle> {
  await runCommand(
    driver,
    database,
    'write',
    async (session) => {
      await session.executeWrite(async (tx) => tx.run(GET_OR_CREATE_INDEX, { name }));
    },
    'getOrCreateIndex'
  );
  return new Neo4jIndexHandle(driver, database, name);
}
