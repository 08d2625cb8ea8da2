/**
 * Neo4j Relationship Operations
 *
 * Direction-aware traversal and edge management between two nodes.
 * Uses runCommand for session lifecycle and query repository for Cypher.
 */

import type { Driver } from 'neo4j-driver';
import type { Direction, StoreNode, StoreRelationship } from '../../types';
import { GraphClientError } from '../../types';
import { runCommand } from '../errors';
import { recordToStoreNode, recordToStoreRelationship } from '../mapping';
import {
  GET_RELATIONSHIPS,
  hasRelationshipWithQuery,
  mergeRelationshipQuery,
  relatedNodesQuery,
  relationshipsWithQuery
} from '../queries';

// ============================================================
// TRAVERSAL
// ============================================================

export async function getRelatedNodes(
  driver: Driver,
  database: string | undefined,
  node: StoreNode,
  direction: Direction,
  relationType: string
): Promise<StoreNode[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(relatedNodesQuery(direction, relationType), {
        id: node.id
      });
      return result.records.map((r) => recordToStoreNode(r.get('m')));
    },
    'getRelatedNodes'
  );
}

export async function hasRelationshipWith(
  driver: Driver,
  database: string | undefined,
  node: StoreNode,
  other: StoreNode,
  direction: Direction,
  relationType: string
): Promise<boolean> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(hasRelationshipWithQuery(direction, relationType), {
        id: node.id,
        otherId: other.id
      });
      const record = result.records[0];
      return record ? record.get('related') === true : false;
    },
    'hasRelationshipWith'
  );
}

export async function getRelationshipsWith(
  driver: Driver,
  database: string | undefined,
  node: StoreNode,
  other: StoreNode,
  direction: Direction,
  relationType: string
): Promise<StoreRelationship[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(relationshipsWithQuery(direction, relationType), {
        id: node.id,
        otherId: other.id
      });
      return result.records.map((r) => recordToStoreRelationship(r.get('r')));
    },
    'getRelationshipsWith'
  );
}

/**
 * All relationships touching a node, regardless of type or direction.
 */
export async function getRelationships(
  driver: Driver,
  database: string | undefined,
  node: StoreNode
): Promise<StoreRelationship[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_RELATIONSHIPS, { id: node.id });
      return result.records.map((r) => recordToStoreRelationship(r.get('r')));
    },
    'getRelationships'
  );
}

// ============================================================
// EDGE CREATION
// ============================================================

/**
 * Create start -[type]-> end unless it already exists.
 */
export async function getOrCreateRelationship(
  driver: Driver,
  database: string | undefined,
  start: StoreNode,
  relationType: string,
  end: StoreNode
): Promise<StoreRelationship> {
  return runCommand(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite(async (tx) =>
        tx.run(mergeRelationshipQuery(relationType), { startId: start.id, endId: end.id })
      );
      const record = result.records[0];
      if (!record) {
        throw new GraphClientError(
          `Cannot relate ${start.id} to ${end.id}: node not found`,
          'NOT_FOUND'
        );
      }
      return recordToStoreRelationship(record.get('r'));
    },
    'getOrCreateRelationship'
  );
}
