/**
 * Node Index Tests
 *
 * Predicate validation, AND-composition and single-result lookups.
 */

import { beforeEach, describe, expect, test, vi } from 'vitest';
import {
  InvalidType,
  MultipleResults,
  NoSuchProperty,
  NotFound,
  PropertyNotIndexed
} from '@/core/errors';
import { NodeIndex } from '@/core/node-index';
import { setLogLevel } from '@/utils/logger';
import { createPeopleGraph } from '@tests/helpers/fixtures';

type PeopleGraph = Awaited<ReturnType<typeof createPeopleGraph>>;

describe('NodeIndex', () => {
  let graph: PeopleGraph;

  beforeEach(async () => {
    setLogLevel('silent');
    graph = await createPeopleGraph();
    await graph.Person.create({ email: 'ada@example.com', name: 'Ada', age: 36, active: true }).save();
    await graph.Person.create({ email: 'bob@example.com', name: 'Bob', age: 36, active: false }).save();
    await graph.Person.create({ email: 'cy@example.com', name: 'Cy', age: 52, active: true }).save();
  });

  describe('search', () => {
    test('matches a single equality term', async () => {
      const found = await graph.Person.index.search({ age: 36 });
      expect(found.map((p) => p.get('name')).sort()).toEqual(['Ada', 'Bob']);
    });

    test('AND-composes several terms', async () => {
      const found = await graph.Person.index.search({ age: 36, active: true });
      expect(found.map((p) => p.get('name'))).toEqual(['Ada']);
    });

    test('returns typed, persisted objects', async () => {
      const [ada] = await graph.Person.index.search({ email: 'ada@example.com' });

      expect(ada?.isPersisted).toBe(true);
      expect(ada?.properties).toEqual({
        email: 'ada@example.com',
        name: 'Ada',
        age: 36,
        active: true
      });
    });

    test('an empty predicate returns every indexed node', async () => {
      const found = await graph.Person.index.search({});
      expect(found).toHaveLength(3);
    });

    test('ignores undefined terms', async () => {
      const found = await graph.Person.index.search({ name: 'Cy', age: undefined });
      expect(found.map((p) => p.get('email'))).toEqual(['cy@example.com']);
    });

    test('no match is an empty list', async () => {
      expect(await graph.Person.index.search({ name: 'Dora' })).toEqual([]);
    });

    test('rejects unindexed properties before asking the store', async () => {
      const index = graph.store.indexes.get('Person');
      if (!index) throw new Error('Person index missing');
      const spy = vi.spyOn(index, 'query');

      await expect(graph.Person.index.search({ height: 1.7 })).rejects.toThrow(PropertyNotIndexed);
      await expect(graph.Person.index.search({ height: 1.7 })).rejects.toThrow(
        'Person.height is not indexed'
      );
      expect(spy).not.toHaveBeenCalled();
    });

    test('rejects undeclared properties', async () => {
      const untyped = new NodeIndex(graph.Person.entry);
      await expect(untyped.search({ nickname: 'x' })).rejects.toThrow(NoSuchProperty);
    });

    test('validates values against their descriptors', async () => {
      const untyped = new NodeIndex(graph.Person.entry);
      await expect(untyped.search({ age: 'thirty-six' })).rejects.toThrow(
        "Property 'age' expects integer, got string \"thirty-six\""
      );
      await expect(untyped.search({ age: 36.5 })).rejects.toThrow(InvalidType);
    });
  });

  describe('get', () => {
    test('returns the single match', async () => {
      const cy = await graph.Person.index.get({ email: 'cy@example.com' });
      expect(cy.get('age')).toBe(52);
    });

    test('throws NotFound for no match', async () => {
      await expect(graph.Person.index.get({ email: 'nobody@example.com' })).rejects.toThrow(NotFound);
      await expect(graph.Person.index.get({ email: 'nobody@example.com' })).rejects.toThrow(
        'No Person node matches the query'
      );
    });

    test('throws MultipleResults for several matches', async () => {
      await expect(graph.Person.index.get({ active: true })).rejects.toThrow(MultipleResults);
      await expect(graph.Person.index.get({ active: true })).rejects.toThrow(
        'Expected one Person node, query matched 2'
      );
    });
  });

  describe('NodeType.all', () => {
    test('lists every saved instance through the category anchor', async () => {
      await graph.Person.create({ height: 1.8 }).save();

      const everyone = await graph.Person.all();

      expect(everyone).toHaveLength(4);
      expect(everyone.map((p) => p.get('name'))).toEqual(['Ada', 'Bob', 'Cy', undefined]);
    });

    test('does not list deleted instances', async () => {
      const bob = await graph.Person.index.get({ name: 'Bob' });
      await bob.delete();

      expect((await graph.Person.all()).map((p) => p.get('name'))).toEqual(['Ada', 'Cy']);
    });

    test('is empty for a type with no instances', async () => {
      expect(await graph.Company.all()).toEqual([]);
    });
  });
});
