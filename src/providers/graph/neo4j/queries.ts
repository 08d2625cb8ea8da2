/**
 * Neo4j Query Repository
 *
 * Centralized Cypher for the store client. Static queries are constants;
 * queries that embed a label or relationship type are built by functions
 * that escape the name first.
 */

import type { Direction, IndexTerm } from '../types';
import { escapeIdentifier } from '../utils';
import { LABELS, RELS, SCHEMA_NAMES } from './constants';

// ============================================================
// SCHEMA QUERIES
// ============================================================

/**
 * CONSTRAINT QUERIES
 *
 * Category and Index are get-or-create through MERGE, which is only
 * atomic under concurrency when a uniqueness constraint backs it.
 * IndexEntry.uniqueKey is what makes insertIfAbsent atomic. Entries of
 * non-unique properties leave it null, and null is never checked.
 */
export const CONSTRAINTS = {
  CATEGORY_NAME: `CREATE CONSTRAINT ${SCHEMA_NAMES.CATEGORY_UNIQUE} IF NOT EXISTS FOR (c:${LABELS.CATEGORY}) REQUIRE c.category IS UNIQUE`,
  INDEX_NAME: `CREATE CONSTRAINT ${SCHEMA_NAMES.INDEX_UNIQUE} IF NOT EXISTS FOR (i:${LABELS.INDEX}) REQUIRE i.name IS UNIQUE`,
  INDEX_ENTRY_UNIQUE_KEY: `CREATE CONSTRAINT ${SCHEMA_NAMES.INDEX_ENTRY_UNIQUE} IF NOT EXISTS FOR (e:${LABELS.INDEX_ENTRY}) REQUIRE e.uniqueKey IS UNIQUE`
} as const;

/**
 * RANGE INDEX QUERIES
 *
 * Every index lookup matches on (index, key, value).
 */
export const RANGE_INDEXES = {
  INDEX_ENTRY_LOOKUP: `CREATE INDEX ${SCHEMA_NAMES.INDEX_ENTRY_LOOKUP} IF NOT EXISTS FOR (e:${LABELS.INDEX_ENTRY}) ON (e.index, e.key, e.value)`
} as const;

// ============================================================
// PATTERN HELPERS
// ============================================================

/**
 * Relationship pattern between two bound variables, oriented from `from`.
 *
 * relationshipPattern('a', 'r', 'KNOWS', 'b', 'incoming')
 *   => (a)<-[r:`KNOWS`]-(b)
 */
export function relationshipPattern(
  from: string,
  rel: string,
  relationType: string,
  to: string,
  direction: Direction
): string {
  const body = `[${rel}:${escapeIdentifier(relationType)}]`;
  switch (direction) {
    case 'outgoing':
      return `(${from})-${body}->(${to})`;
    case 'incoming':
      return `(${from})<-${body}-(${to})`;
    case 'either':
      return `(${from})-${body}-(${to})`;
  }
}

// ============================================================
// NODE QUERIES
// ============================================================

/**
 * NODE CREATE QUERY
 *
 * The node and its category edge are written in one statement so a
 * created node is never left without its anchor link.
 */
export function createNodeQuery(label?: string, categoryRelationType?: string): string {
  const node = label ? `(n:${escapeIdentifier(label)})` : '(n)';

  if (!categoryRelationType) {
    return `
  CREATE ${node}
  SET n = $properties
  RETURN n, null AS r
`;
  }

  return `
  MATCH (c) WHERE elementId(c) = $categoryId
  CREATE ${node}
  SET n = $properties
  CREATE (c)-[r:${escapeIdentifier(categoryRelationType)}]->(n)
  RETURN n, r
`;
}

/**
 * PROPERTY OVERWRITE QUERY
 *
 * `SET n = $map` replaces the whole property map: keys missing from
 * the map are removed from the node.
 */
export const SET_PROPERTIES = `
  MATCH (n) WHERE elementId(n) = $id
  SET n = $properties
  RETURN n
`;

export const GET_NODE = `
  MATCH (n) WHERE elementId(n) = $id
  RETURN n
`;

/**
 * DELETE QUERIES
 *
 * Plain DELETE, not DETACH DELETE: callers pass the relationships they
 * mean to remove, and a node that still has others fails loudly.
 */
export const DELETE_RELATIONSHIPS = `
  MATCH ()-[r]->() WHERE elementId(r) IN $ids
  DELETE r
`;

export const DELETE_NODES = `
  MATCH (n) WHERE elementId(n) IN $ids
  DELETE n
`;

// ============================================================
// CATEGORY QUERIES
// ============================================================

export const GET_OR_CREATE_CATEGORY = `
  MERGE (c:${LABELS.CATEGORY} {category: $name})
  RETURN c
`;

// ============================================================
// RELATIONSHIP QUERIES
// ============================================================

export const GET_RELATIONSHIPS = `
  MATCH (n)-[r]-() WHERE elementId(n) = $id
  RETURN DISTINCT r
`;

export function relatedNodesQuery(direction: Direction, relationType: string): string {
  return `
  MATCH ${relationshipPattern('n', 'r', relationType, 'm', direction)}
  WHERE elementId(n) = $id
  RETURN DISTINCT m
`;
}

export function relationshipsWithQuery(direction: Direction, relationType: string): string {
  return `
  MATCH ${relationshipPattern('a', 'r', relationType, 'b', direction)}
  WHERE elementId(a) = $id AND elementId(b) = $otherId
  RETURN DISTINCT r
`;
}

export function hasRelationshipWithQuery(direction: Direction, relationType: string): string {
  return `
  MATCH (a), (b)
  WHERE elementId(a) = $id AND elementId(b) = $otherId
  RETURN EXISTS { MATCH ${relationshipPattern('a', '', relationType, 'b', direction)} } AS related
`;
}

/**
 * RELATIONSHIP MERGE QUERY
 *
 * MERGE on a directed pattern makes relate() idempotent: a second call
 * returns the existing edge.
 */
export function mergeRelationshipQuery(relationType: string): string {
  return `
  MATCH (a) WHERE elementId(a) = $startId
  MATCH (b) WHERE elementId(b) = $endId
  MERGE (a)-[r:${escapeIdentifier(relationType)}]->(b)
  RETURN r
`;
}

// ============================================================
// INDEX QUERIES
// ============================================================

export const GET_OR_CREATE_INDEX = `
  MERGE (i:${LABELS.INDEX} {name: $name})
  RETURN i
`;

/**
 * PLAIN INDEX INSERT
 *
 * MERGE on the full entry including its target, so re-inserting the
 * same (key, value) for the same node does not duplicate it.
 */
export const INDEX_INSERT = `
  MATCH (n) WHERE elementId(n) = $target
  MERGE (e:${LABELS.INDEX_ENTRY} {index: $index, key: $key, value: $value, target: $target})
  MERGE (e)-[:${RELS.INDEXES}]->(n)
`;

/**
 * CONDITIONAL INDEX INSERT
 *
 * MERGE on uniqueKey either creates the entry for this node or matches
 * the entry some other node already holds. The uniqueness constraint
 * serializes concurrent creators. The edge is only written when the
 * entry belongs to this node.
 */
export const INDEX_INSERT_IF_ABSENT = `
  MATCH (n) WHERE elementId(n) = $target
  MERGE (e:${LABELS.INDEX_ENTRY} {uniqueKey: $uniqueKey})
  ON CREATE SET e.index = $index, e.key = $key, e.value = $value, e.target = $target
  WITH e, n, e.target = $target AS inserted
  FOREACH (_ IN CASE WHEN inserted THEN [1] ELSE [] END |
    MERGE (e)-[:${RELS.INDEXES}]->(n)
  )
  RETURN inserted
`;

export const INDEX_REMOVE = `
  MATCH (e:${LABELS.INDEX_ENTRY} {index: $index})-[:${RELS.INDEXES}]->(n)
  WHERE elementId(n) = $target
  DETACH DELETE e
`;

/**
 * Query expression builder: AND-composition of equality terms.
 *
 * Each term adds one MATCH against the same target variable, so a node
 * is returned only when every term has an entry pointing at it.
 * `encode` converts term values to driver parameters.
 */
export function buildIndexQuery(
  index: string,
  terms: IndexTerm[],
  encode: (value: IndexTerm['value']) => unknown = (value) => value
): { cypher: string; params: Record<string, unknown> } {
  const params: Record<string, unknown> = { index };

  if (terms.length === 0) {
    return {
      cypher: `
  MATCH (:${LABELS.INDEX_ENTRY} {index: $index})-[:${RELS.INDEXES}]->(n)
  RETURN DISTINCT n
`,
      params
    };
  }

  const matches = terms.map((term, i) => {
    params[`key${i}`] = term.key;
    params[`value${i}`] = encode(term.value);
    return `  MATCH (e${i}:${LABELS.INDEX_ENTRY} {index: $index, key: $key${i}, value: $value${i}})-[:${RELS.INDEXES}]->(n)`;
  });

  return {
    cypher: `\n${matches.join('\n')}\n  RETURN DISTINCT n\n`,
    params
  };
}
