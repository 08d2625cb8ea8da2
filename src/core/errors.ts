/**
 * Mapping Errors
 *
 * Every failure the mapping core raises itself. Store failures are not
 * wrapped: they reach the caller as GraphClientError.
 */

import type { PropertyKind } from './types';

export type OgmErrorCode =
  | 'NO_SUCH_PROPERTY'
  | 'INVALID_TYPE'
  | 'PROPERTY_NOT_INDEXED'
  | 'NOT_UNIQUE'
  | 'NODE_NOT_PERSISTED'
  | 'TYPE_MISMATCH'
  | 'MULTIPLE_RELATIONSHIPS'
  | 'NO_SUCH_RELATIONSHIP'
  | 'NOT_FOUND'
  | 'MULTIPLE_RESULTS'
  | 'SCHEMA_DEFINITION'
  | 'UNKNOWN_TYPE';

export class OgmError extends Error {
  constructor(
    message: string,
    public readonly code: OgmErrorCode
  ) {
    super(message);
    this.name = 'OgmError';
  }
}

/** Short, quoted rendering of an arbitrary value for error messages */
function describe(value: unknown): string {
  if (typeof value === 'string') return `string "${value}"`;
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return `${typeof value} ${String(value)}`;
}

// ============================================================
// PROPERTY ERRORS
// ============================================================

export class NoSuchProperty extends OgmError {
  constructor(
    public readonly typeName: string,
    public readonly property: string
  ) {
    super(`${typeName} has no property '${property}'`, 'NO_SUCH_PROPERTY');
    this.name = 'NoSuchProperty';
  }
}

export class InvalidType extends OgmError {
  constructor(
    public readonly property: string,
    public readonly expected: PropertyKind,
    public readonly value: unknown
  ) {
    super(`Property '${property}' expects ${expected}, got ${describe(value)}`, 'INVALID_TYPE');
    this.name = 'InvalidType';
  }
}

export class PropertyNotIndexed extends OgmError {
  constructor(
    public readonly typeName: string,
    public readonly property: string
  ) {
    super(`${typeName}.${property} is not indexed`, 'PROPERTY_NOT_INDEXED');
    this.name = 'PropertyNotIndexed';
  }
}

export class NotUnique extends OgmError {
  constructor(
    public readonly typeName: string,
    public readonly property: string,
    public readonly value: unknown
  ) {
    super(
      `${typeName}.${property} must be unique; ${describe(value)} is already taken`,
      'NOT_UNIQUE'
    );
    this.name = 'NotUnique';
  }
}

// ============================================================
// LIFECYCLE ERRORS
// ============================================================

export class NodeNotPersisted extends OgmError {
  constructor(
    public readonly typeName: string,
    public readonly operation: string
  ) {
    super(`Cannot ${operation}: ${typeName} node has not been saved`, 'NODE_NOT_PERSISTED');
    this.name = 'NodeNotPersisted';
  }
}

// ============================================================
// RELATIONSHIP ERRORS
// ============================================================

export class TypeMismatch extends OgmError {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Expected a ${expected} node, got ${actual}`, 'TYPE_MISMATCH');
    this.name = 'TypeMismatch';
  }
}

export class MultipleRelationships extends OgmError {
  constructor(
    public readonly relationType: string,
    public readonly count: number
  ) {
    super(`Expected a single ${relationType} relationship, found ${count}`, 'MULTIPLE_RELATIONSHIPS');
    this.name = 'MultipleRelationships';
  }
}

export class NoSuchRelationship extends OgmError {
  constructor(
    public readonly typeName: string,
    public readonly relationship: string
  ) {
    super(`${typeName} has no relationship '${relationship}'`, 'NO_SUCH_RELATIONSHIP');
    this.name = 'NoSuchRelationship';
  }
}

// ============================================================
// QUERY ERRORS
// ============================================================

export class NotFound extends OgmError {
  constructor(public readonly typeName: string) {
    super(`No ${typeName} node matches the query`, 'NOT_FOUND');
    this.name = 'NotFound';
  }
}

export class MultipleResults extends OgmError {
  constructor(
    public readonly typeName: string,
    public readonly count: number
  ) {
    super(`Expected one ${typeName} node, query matched ${count}`, 'MULTIPLE_RESULTS');
    this.name = 'MultipleResults';
  }
}

// ============================================================
// SCHEMA ERRORS
// ============================================================

export class SchemaDefinitionError extends OgmError {
  constructor(message: string) {
    super(message, 'SCHEMA_DEFINITION');
    this.name = 'SchemaDefinitionError';
  }
}

export class UnknownNodeType extends OgmError {
  constructor(public readonly typeName: string) {
    super(`Node type '${typeName}' is not registered`, 'UNKNOWN_TYPE');
    this.name = 'UnknownNodeType';
  }
}
