/**
 * Neo4j Category Operations
 *
 * Category anchors: one node per mapped type, linked to every instance.
 */

import type { Driver } from 'neo4j-driver';
import type { StoreNode } from '../../types';
import { GraphClientError } from '../../types';
import { runCommand } from '../errors';
import { recordToStoreNode } from '../mapping';
import { GET_OR_CREATE_CATEGORY } from '../queries';

/**
 * Get or create the category anchor for a type name.
 * Atomic under concurrency thanks to the category uniqueness constraint.
 */
export async function getOrCreateCategory(
  driver: Driver,
  database: string | undefined,
  name: string
): Promise<StoreNode> {
  return runCommand(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite(async (tx) =>
        tx.run(GET_OR_CREATE_CATEGORY, { name })
      );
      const record = result.records[0];
      if (!record) {
        throw new GraphClientError(`Failed to create category ${name}`, 'QUERY_ERROR');
      }
      return recordToStoreNode(record.get('c'));
    },
    'getOrCreateCategory'
  );
}
