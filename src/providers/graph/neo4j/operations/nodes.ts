/**
 * Neo4j Node Operations
 *
 * Create, overwrite, read and delete nodes by element id.
 * Uses runCommand for session lifecycle and query repository for Cypher.
 */

import type { Driver } from 'neo4j-driver';
import type {
  CreatedNode,
  CreateNodeInput,
  StoreEntity,
  StoreNode,
  StoreProperties
} from '../../types';
import { GraphClientError, isStoreRelationship } from '../../types';
import { runCommand } from '../errors';
import {
  fromNeo4jProperties,
  recordToStoreNode,
  recordToStoreRelationship,
  toNeo4jProperties
} from '../mapping';
import { createNodeQuery, DELETE_NODES, DELETE_RELATIONSHIPS, GET_NODE, SET_PROPERTIES } from '../queries';

// ============================================================
// CREATE
// ============================================================

/**
 * Create a node and, when requested, its category edge.
 * Both are written by one statement in one transaction.
 */
export async function createNode(
  driver: Driver,
  database: string | undefined,
  input: CreateNodeInput
): Promise<CreatedNode> {
  const cypher = createNodeQuery(input.label, input.category?.relationType);
  const params = {
    properties: toNeo4jProperties(input.properties),
    categoryId: input.category?.node.id ?? null
  };

  return runCommand(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite(async (tx) => tx.run(cypher, params));
      const record = result.records[0];
      if (!record) {
        // Only reachable when the category anchor vanished under us
        throw new GraphClientError(
          `Category node not found: ${input.category?.node.id ?? '(none)'}`,
          'NOT_FOUND'
        );
      }
      const relationship = record.get('r');
      return {
        node: recordToStoreNode(record.get('n')),
        relationship: relationship ? recordToStoreRelationship(relationship) : null
      };
    },
    'createNode'
  );
}

// ============================================================
// PROPERTIES
// ============================================================

/**
 * Overwrite all properties of a node.
 */
export async function setProperties(
  driver: Driver,
  database: string | undefined,
  node: StoreNode,
  properties: StoreProperties
): Promise<StoreNode> {
  return runCommand(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite(async (tx) =>
        tx.run(SET_PROPERTIES, { id: node.id, properties: toNeo4jProperties(properties) })
      );
      const record = result.records[0];
      if (!record) {
        throw new GraphClientError(`Node not found: ${node.id}`, 'NOT_FOUND');
      }
      return recordToStoreNode(record.get('n'));
    },
    'setProperties'
  );
}

export async function getProperties(
  driver: Driver,
  database: string | undefined,
  node: StoreNode
): Promise<Record<string, unknown>> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_NODE, { id: node.id });
      const record = result.records[0];
      if (!record) {
        throw new GraphClientError(`Node not found: ${node.id}`, 'NOT_FOUND');
      }
      return fromNeo4jProperties(record.get('n').properties);
    },
    'getProperties'
  );
}

// ============================================================
// DELETE OPERATIONS
// ============================================================

/**
 * Delete relationships and nodes in a single transaction.
 * Relationships go first so the node deletes do not trip over them.
 */
export async function deleteEntities(
  driver: Driver,
  database: string | undefined,
  entities: StoreEntity[]
): Promise<void> {
  if (entities.length === 0) return;

  const relationshipIds: string[] = [];
  const nodeIds: string[] = [];
  for (const entity of entities) {
    if (isStoreRelationship(entity)) {
      relationshipIds.push(entity.id);
    } else {
      nodeIds.push(entity.id);
    }
  }

  return runCommand(
    driver,
    database,
    'write',
    async (session) => {
      await session.executeWrite(async (tx) => {
        if (relationshipIds.length > 0) {
          await tx.run(DELETE_RELATIONSHIPS, { ids: relationshipIds });
        }
        if (nodeIds.length > 0) {
          await tx.run(DELETE_NODES, { ids: nodeIds });
        }
      });
    },
    'delete'
  );
}
