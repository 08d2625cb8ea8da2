/**
 * Mapping Core
 *
 * Public API barrel file.
 *
 * @example
 * ```typescript
 * import { getConnectionAdapter, stringProperty } from '@/core';
 *
 * const { registry } = await getConnectionAdapter();
 * const Person = await registry.register({
 *   name: 'Person',
 *   properties: [stringProperty('email', { uniqueIndex: true })]
 * });
 * const ada = await Person.create({ email: 'ada@example.com' }).save();
 * ```
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Connection & Schema
// ═══════════════════════════════════════════════════════════════════════════════

export { ConnectionAdapter, closeConnectionAdapter, getConnectionAdapter } from './connection';
export { type NodeDefinition, NodeType, SchemaEntry, SchemaRegistry } from './schema';

// ═══════════════════════════════════════════════════════════════════════════════
// Properties
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type AnyPropertyDescriptor,
  assertProperties,
  booleanProperty,
  floatProperty,
  integerProperty,
  type PropertiesOf,
  PropertyDescriptor,
  type PropertyLookup,
  type PropertyOptions,
  stringProperty
} from './properties';
export {
  type Indexing,
  PROPERTY_KINDS,
  type PropertyKind,
  type PropertyKindMap,
  type PropertyMap,
  type PropertyValue
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Nodes, Relationships & Indexes
// ═══════════════════════════════════════════════════════════════════════════════

export { MappedNode } from './node';
export { indexNode, NodeIndex, unindexNode } from './node-index';
export {
  relationship,
  type RelationshipContext,
  RelationshipDefinition,
  type RelationshipDefinitions,
  RelationshipManager,
  type RelationshipManagerClass,
  type RelationshipOptions,
  relationshipFrom,
  relationshipTo
} from './relationships';

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

export {
  InvalidType,
  MultipleRelationships,
  MultipleResults,
  NodeNotPersisted,
  NoSuchProperty,
  NoSuchRelationship,
  NotFound,
  NotUnique,
  OgmError,
  type OgmErrorCode,
  PropertyNotIndexed,
  SchemaDefinitionError,
  TypeMismatch,
  UnknownNodeType
} from './errors';
