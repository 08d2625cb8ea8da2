/**
 * Shared Test Fixtures
 *
 * Node type definitions and a ready-to-use adapter over the in-memory
 * store.
 */

import { ConnectionAdapter } from '@/core/connection';
import {
  booleanProperty,
  floatProperty,
  integerProperty,
  stringProperty
} from '@/core/properties';
import { relationship, relationshipFrom, relationshipTo } from '@/core/relationships';
import { MemoryStoreClient } from './memory-store';

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const VALID_MINIMAL_CONFIG = {
  neo4j: {
    url: 'neo4j://localhost:7687'
  }
};

export const VALID_FULL_CONFIG = {
  neo4j: {
    url: 'bolt+s://graph.example.com:7687',
    user: 'cartograph',
    password: 'test-secret',
    database: 'people'
  },
  logging: {
    level: 'debug'
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Schema Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export function personProperties() {
  return [
    stringProperty('email', { uniqueIndex: true }),
    stringProperty('name', { index: true }),
    integerProperty('age', { index: true }),
    floatProperty('height'),
    booleanProperty('active', { index: true })
  ];
}

/**
 * Adapter over a fresh in-memory store with Person and Company registered.
 *
 * Person relationships:
 * - friends: Person -[KNOWS]-> Person
 * - followers: Person <-[FOLLOWS]- Person
 * - colleagues: Person -[WORKS_WITH]- Person
 * - employer: Person -[WORKS_AT]-> Company
 */
export async function createPeopleGraph() {
  const store = new MemoryStoreClient();
  const adapter = new ConnectionAdapter(store);

  const Person = await adapter.registry.register({
    name: 'Person',
    properties: personProperties(),
    relationships: {
      friends: relationshipTo('Person', 'KNOWS'),
      followers: relationshipFrom('Person', 'FOLLOWS'),
      colleagues: relationship('Person', 'WORKS_WITH'),
      employer: relationshipTo('Company', 'WORKS_AT')
    }
  });

  const Company = await adapter.registry.register({
    name: 'Company',
    properties: [stringProperty('name', { uniqueIndex: true })],
    relationships: {
      employees: relationshipFrom('Person', 'WORKS_AT')
    }
  });

  return { store, adapter, Person, Company };
}
