/**
 * Neo4j Schema Registry
 *
 * Single source of truth for the bookkeeping labels and relationship
 * types the store client writes next to user data.
 */

// ============================================================
// NODE LABELS
// ============================================================

/**
 * Internal node labels.
 *
 * - Category: One anchor per mapped type, root of "all instances"
 * - Index: Marker node recording that a named index exists
 * - IndexEntry: One (index, key, value) -> node entry
 */
export const LABELS = {
  CATEGORY: 'Category',
  INDEX: 'Index',
  INDEX_ENTRY: 'IndexEntry'
} as const;

export type Label = (typeof LABELS)[keyof typeof LABELS];

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

/**
 * Internal relationship types.
 *
 * - INDEXES: IndexEntry -> indexed node
 *
 * Category edges are typed per mapped type (Person -> PERSON) and are
 * not listed here.
 */
export const RELS = {
  INDEXES: 'INDEXES'
} as const;

export type RelType = (typeof RELS)[keyof typeof RELS];

// ============================================================
// SCHEMA ELEMENT NAMES
// ============================================================

export const SCHEMA_NAMES = {
  CATEGORY_UNIQUE: 'category_name_unique',
  INDEX_UNIQUE: 'index_name_unique',
  INDEX_ENTRY_UNIQUE: 'index_entry_unique_key',
  INDEX_ENTRY_LOOKUP: 'index_entry_lookup'
} as const;

// ============================================================
// RETRY CONFIGURATION
// ============================================================

/**
 * Retry settings for transient error handling.
 */
export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 100
} as const;
