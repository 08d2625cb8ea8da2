/**
 * Neo4j Record Mapping
 *
 * Translators between Neo4j driver values and store types.
 * Centralizes integer conversion and element id handling.
 */

import neo4j from 'neo4j-driver';
import type { StoreNode, StoreProperties, StoreRelationship, StoreValue } from '../types';

// ============================================================
// DRIVER SHAPES
// ============================================================

/**
 * Shape of a Neo4j node as returned by the driver.
 */
export interface Neo4jNode {
  elementId: string;
  properties: Record<string, unknown>;
}

/**
 * Shape of a Neo4j relationship as returned by the driver.
 */
export interface Neo4jRelationship {
  elementId: string;
  type: string;
  startNodeElementId: string;
  endNodeElementId: string;
}

// ============================================================
// VALUE CONVERSION
// ============================================================

/**
 * Convert a driver value to a plain JS value.
 * Neo4j integers are 64-bit; values outside the safe JS range would
 * lose precision, so they are rejected.
 */
export function fromNeo4jValue(value: unknown): unknown {
  if (neo4j.isInt(value)) {
    if (!value.inSafeRange()) {
      throw new RangeError(`Integer ${value.toString()} exceeds the safe JS integer range`);
    }
    return value.toNumber();
  }
  return value;
}

/**
 * Convert a store value to a driver parameter.
 * JS has one number type; safe integers are sent as Neo4j integers so
 * they round-trip as integers instead of floats. Larger integral numbers
 * stay floats, since neo4j.int would clamp them to 64 bits.
 */
export function toNeo4jValue(value: StoreValue): unknown {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return neo4j.int(value);
  }
  return value;
}

export function toNeo4jProperties(properties: StoreProperties): Record<string, unknown> {
  const converted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    converted[key] = toNeo4jValue(value);
  }
  return converted;
}

export function fromNeo4jProperties(properties: Record<string, unknown>): Record<string, unknown> {
  const converted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    converted[key] = fromNeo4jValue(value);
  }
  return converted;
}

// ============================================================
// RECORD TRANSLATORS
// ============================================================

export function recordToStoreNode(node: Neo4jNode): StoreNode {
  return {
    id: node.elementId,
    properties: fromNeo4jProperties(node.properties)
  };
}

export function recordToStoreRelationship(relationship: Neo4jRelationship): StoreRelationship {
  return {
    id: relationship.elementId,
    type: relationship.type,
    startId: relationship.startNodeElementId,
    endId: relationship.endNodeElementId
  };
}
