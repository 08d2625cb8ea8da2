/**
 * Schema Registry Tests
 *
 * Registration checks, index binding and type lookup.
 */

import { beforeEach, describe, expect, test } from 'vitest';
import { ConnectionAdapter } from '@/core/connection';
import { NoSuchProperty, SchemaDefinitionError, UnknownNodeType } from '@/core/errors';
import { integerProperty, stringProperty } from '@/core/properties';
import { relationshipTo } from '@/core/relationships';
import { setLogLevel } from '@/utils/logger';
import { MemoryStoreClient } from '@tests/helpers/memory-store';

describe('SchemaRegistry', () => {
  let store: MemoryStoreClient;
  let adapter: ConnectionAdapter;

  beforeEach(() => {
    setLogLevel('silent');
    store = new MemoryStoreClient();
    adapter = new ConnectionAdapter(store);
  });

  describe('register', () => {
    test('binds the type to an index named after it', async () => {
      const Person = await adapter.registry.register({
        name: 'Person',
        properties: [stringProperty('name', { index: true })]
      });

      expect(Person.name).toBe('Person');
      expect(Person.index.name).toBe('Person');
      expect([...store.indexes.keys()]).toEqual(['Person']);
    });

    test('exposes descriptors by name', async () => {
      const Person = await adapter.registry.register({
        name: 'Person',
        properties: [stringProperty('name'), integerProperty('age', { index: true })]
      });

      expect(Person.getProperty('age').kind).toBe('integer');
      expect(adapter.registry.getProperty('Person', 'name').indexing).toBe('none');
      expect(() => Person.getProperty('email')).toThrow("Person has no property 'email'");
      expect(() => adapter.registry.getProperty('Person', 'email')).toThrow(NoSuchProperty);
    });

    test('rejects a type registered twice', async () => {
      await adapter.registry.register({ name: 'Person', properties: [stringProperty('name')] });

      await expect(
        adapter.registry.register({ name: 'Person', properties: [stringProperty('email')] })
      ).rejects.toThrow("Node type 'Person' is already registered");
    });

    test('rejects concurrent registration of the same name', async () => {
      const first = adapter.registry.register({ name: 'Person', properties: [] });
      const second = adapter.registry.register({ name: 'Person', properties: [] });

      await expect(second).rejects.toThrow(SchemaDefinitionError);
      await expect(first).resolves.toBeDefined();
    });

    test('rejects duplicate property names', async () => {
      await expect(
        adapter.registry.register({
          name: 'Person',
          properties: [stringProperty('name'), stringProperty('name', { index: true })]
        })
      ).rejects.toThrow("Person declares property 'name' twice");
      expect(adapter.registry.has('Person')).toBe(false);
    });

    test('rejects a relationship named like a property', async () => {
      await expect(
        adapter.registry.register({
          name: 'Person',
          properties: [stringProperty('friends')],
          relationships: { friends: relationshipTo('Person', 'KNOWS') }
        })
      ).rejects.toThrow("Person: relationship 'friends' collides with a property of the same name");
    });

    test('rejects an empty type name', async () => {
      await expect(adapter.registry.register({ name: '', properties: [] })).rejects.toThrow(
        'Node type names must not be empty'
      );
    });

    test('a failed index lookup leaves the name free', async () => {
      const lookup = store.getOrCreateIndex.bind(store);
      let calls = 0;
      store.getOrCreateIndex = async (name) => {
        calls++;
        if (calls === 1) throw new Error('index unavailable');
        return lookup(name);
      };

      await expect(adapter.registry.register({ name: 'Person', properties: [] })).rejects.toThrow(
        'index unavailable'
      );
      await expect(
        adapter.registry.register({ name: 'Person', properties: [] })
      ).resolves.toBeDefined();
    });
  });

  describe('get', () => {
    test('returns the frozen entry of a registered type', async () => {
      await adapter.registry.register({
        name: 'Person',
        properties: [stringProperty('name')],
        relationships: { friends: relationshipTo('Person', 'KNOWS') }
      });

      const entry = adapter.registry.get('Person');
      expect(entry.typeName).toBe('Person');
      expect([...entry.properties.keys()]).toEqual(['name']);
      expect(Object.keys(entry.relationships)).toEqual(['friends']);
      expect(Object.isFrozen(entry)).toBe(true);
      expect(Object.isFrozen(entry.relationships)).toBe(true);
    });

    test('throws UnknownNodeType for an unregistered name', () => {
      expect(() => adapter.registry.get('Robot')).toThrow(UnknownNodeType);
      expect(() => adapter.registry.get('Robot')).toThrow("Node type 'Robot' is not registered");
    });

    test('lists registered names in registration order', async () => {
      await adapter.registry.register({ name: 'Person', properties: [] });
      await adapter.registry.register({ name: 'Company', properties: [] });

      expect(adapter.registry.typeNames).toEqual(['Person', 'Company']);
      expect(adapter.registry.has('Company')).toBe(true);
      expect(adapter.registry.has('Robot')).toBe(false);
    });
  });
});
