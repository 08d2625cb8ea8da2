/**
 * Neo4j Schema Management
 *
 * Creates the constraints and indexes the store client relies on.
 * Designed for idempotent execution - safe to run multiple times.
 */

import type { Session } from 'neo4j-driver';
import { isSchemaAlreadyExistsError } from './errors';
import { CONSTRAINTS, RANGE_INDEXES } from './queries';

// ============================================================
// SCHEMA INITIALIZATION
// ============================================================

/**
 * Initialize all database schema elements.
 *
 * Constraints come first: they back the MERGE-based get-or-create of
 * categories and indexes, and the conditional insert of unique entries.
 * The lookup index follows.
 *
 * All operations are idempotent via IF NOT EXISTS clauses.
 */
export async function initializeSchema(session: Session): Promise<void> {
  // Constraints
  await runSchemaOperation(session, CONSTRAINTS.CATEGORY_NAME);
  await runSchemaOperation(session, CONSTRAINTS.INDEX_NAME);
  await runSchemaOperation(session, CONSTRAINTS.INDEX_ENTRY_UNIQUE_KEY);

  // Range indexes
  await runSchemaOperation(session, RANGE_INDEXES.INDEX_ENTRY_LOOKUP);
}

/**
 * Run a single schema operation, tolerating a concurrent creator.
 * Another process may create the same element between our check and
 * our write; "already exists" then means the schema is in place.
 */
async function runSchemaOperation(session: Session, cypher: string): Promise<void> {
  try {
    await session.run(cypher);
  } catch (error) {
    if (isSchemaAlreadyExistsError(error)) {
      return;
    }
    throw error;
  }
}
