/**
 * Property Descriptors
 *
 * Typed field declarations for node types. A descriptor knows its name,
 * its kind and how it is indexed, and validates values without coercion.
 */

import { InvalidType, SchemaDefinitionError } from './errors';
import type { Indexing, PropertyKind, PropertyKindMap, PropertyMap } from './types';

export interface PropertyOptions {
  /** Index the property for equality lookups */
  index?: boolean;
  /** Index the property and reject a second node with the same value */
  uniqueIndex?: boolean;
  /** Allow the property to be left empty; never with uniqueIndex */
  blank?: boolean;
}

function matchesKind(kind: PropertyKind, value: unknown): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isSafeInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

export class PropertyDescriptor<N extends string = string, K extends PropertyKind = PropertyKind> {
  readonly indexing: Indexing;
  readonly blank: boolean;

  constructor(
    readonly name: N,
    readonly kind: K,
    options: PropertyOptions = {}
  ) {
    if (name.length === 0) {
      throw new SchemaDefinitionError('Property names must not be empty');
    }
    if (options.uniqueIndex && options.index) {
      throw new SchemaDefinitionError(
        `Property '${name}': uniqueIndex and index are mutually exclusive`
      );
    }
    if (options.uniqueIndex && options.blank) {
      throw new SchemaDefinitionError(
        `Property '${name}': uniquely indexed properties cannot also be blank`
      );
    }

    this.indexing = options.uniqueIndex ? 'unique_index' : options.index ? 'index' : 'none';
    this.blank = options.blank ?? false;
    Object.freeze(this);
  }

  get isIndexed(): boolean {
    return this.indexing !== 'none';
  }

  get isUnique(): boolean {
    return this.indexing === 'unique_index';
  }

  accepts(value: unknown): value is PropertyKindMap[K] {
    return matchesKind(this.kind, value);
  }

  /**
   * Return the value unchanged if it matches the declared kind.
   * @throws InvalidType otherwise
   */
  validate(value: unknown): PropertyKindMap[K] {
    if (!this.accepts(value)) {
      throw new InvalidType(this.name, this.kind, value);
    }
    return value;
  }
}

export type AnyPropertyDescriptor = PropertyDescriptor<string, PropertyKind>;

/**
 * Property value shape declared by a list of descriptors.
 *
 * PropertiesOf<[PropertyDescriptor<'name', 'string'>]> = { name?: string }
 */
export type PropertiesOf<D extends readonly AnyPropertyDescriptor[]> = {
  [P in D[number] as P['name']]?: PropertyKindMap[P['kind']];
};

/** Resolves a declared property by name; throws NoSuchProperty otherwise */
export interface PropertyLookup {
  property(name: string): AnyPropertyDescriptor;
}

/**
 * Check every defined value against its descriptor, narrowing the record
 * to the declared property shape.
 */
export function assertProperties<P extends PropertyMap>(
  lookup: PropertyLookup,
  values: Record<string, unknown>
): asserts values is P {
  for (const [name, value] of Object.entries(values)) {
    const descriptor = lookup.property(name);
    if (value === undefined) continue;
    descriptor.validate(value);
  }
}

// ============================================================
// DESCRIPTOR FACTORIES
// ============================================================

export function stringProperty<N extends string>(
  name: N,
  options?: PropertyOptions
): PropertyDescriptor<N, 'string'> {
  return new PropertyDescriptor(name, 'string', options);
}

export function integerProperty<N extends string>(
  name: N,
  options?: PropertyOptions
): PropertyDescriptor<N, 'integer'> {
  return new PropertyDescriptor(name, 'integer', options);
}

export function floatProperty<N extends string>(
  name: N,
  options?: PropertyOptions
): PropertyDescriptor<N, 'float'> {
  return new PropertyDescriptor(name, 'float', options);
}

export function booleanProperty<N extends string>(
  name: N,
  options?: PropertyOptions
): PropertyDescriptor<N, 'boolean'> {
  return new PropertyDescriptor(name, 'boolean', options);
}
