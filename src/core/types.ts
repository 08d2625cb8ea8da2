/**
 * Core Types
 *
 * Value and schema types shared by the mapping modules.
 */

/**
 * Kinds a property may be declared with.
 *
 * - string: any JS string
 * - integer: a number for which Number.isSafeInteger holds
 * - float: any finite number
 * - boolean: true or false
 */
export const PROPERTY_KINDS = ['string', 'integer', 'float', 'boolean'] as const;

export type PropertyKind = (typeof PROPERTY_KINDS)[number];

/** Runtime value type of each kind */
export interface PropertyKindMap {
  string: string;
  integer: number;
  float: number;
  boolean: boolean;
}

export type PropertyValue = PropertyKindMap[PropertyKind];

/**
 * Property values of a node. Keys are declared property names; an
 * absent or undefined value means the property is unset.
 */
export type PropertyMap = { [name: string]: PropertyValue | undefined };

export type Indexing = 'none' | 'index' | 'unique_index';
