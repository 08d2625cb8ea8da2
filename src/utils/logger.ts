/**
 * Logger
 *
 * Semantic logging for mapping operations:
 * - CONNECT: Store connection lifecycle
 * - SCHEMA: Node type registration
 * - SAVE / DELETE: Node lifecycle
 *
 * Design principles:
 * - Action-oriented verbs (Created, Updated, Rolled back)
 * - One line per event, ids shortened
 * - Quiet by default: only warnings and errors reach the console
 */

import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Levels
// ═══════════════════════════════════════════════════════════════════════════════

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Element ids are long; the tail is what tells them apart */
function shortId(id: string): string {
  return id.length <= 8 ? id : id.slice(-8);
}

function line(tag: string, message: string): string {
  return `${c.dim(formatTime())} ${tag} ${message}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Connection Logging (CONNECT)
// ═══════════════════════════════════════════════════════════════════════════════

export function logConnected(uri: string, database: string | undefined): void {
  if (!enabled('info')) return;
  const target = database ? `${uri} ${c.dim(`(${database})`)}` : uri;
  console.log(line(c.cyan('CONNECT'), `${c.brightGreen('✓ Connected')} to ${target}`));
}

export function logDisconnected(): void {
  if (!enabled('info')) return;
  console.log(line(c.cyan('CONNECT'), c.dim('Connection closed')));
}

export function logConnectionFailed(error: Error): void {
  if (!enabled('error')) return;
  console.error(line(c.cyan('CONNECT'), `${c.brightRed('✗ Failed')}: ${error.message}`));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Schema Logging (SCHEMA)
// ═══════════════════════════════════════════════════════════════════════════════

export function logTypeRegistered(typeName: string, propertyCount: number): void {
  if (!enabled('info')) return;
  const detail = c.dim(`(${propertyCount} ${propertyCount === 1 ? 'property' : 'properties'})`);
  console.log(line(c.magenta('SCHEMA'), `${c.white(typeName)} registered ${detail}`));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Node Lifecycle Logging (SAVE / DELETE)
// ═══════════════════════════════════════════════════════════════════════════════

export function logNodeCreated(typeName: string, id: string): void {
  if (!enabled('debug')) return;
  console.log(line(c.green('SAVE'), `${c.brightGreen('+ Created')} ${typeName} ${c.dim(`[${shortId(id)}]`)}`));
}

export function logNodeUpdated(typeName: string, id: string): void {
  if (!enabled('debug')) return;
  console.log(line(c.green('SAVE'), `${c.cyan('~ Updated')} ${typeName} ${c.dim(`[${shortId(id)}]`)}`));
}

export function logNodeDeleted(typeName: string, id: string, relationshipCount: number): void {
  if (!enabled('debug')) return;
  const detail = relationshipCount > 0 ? c.dim(` (+${relationshipCount} relationships)`) : '';
  console.log(
    line(c.red('DELETE'), `${c.brightRed('- Deleted')} ${typeName} ${c.dim(`[${shortId(id)}]`)}${detail}`)
  );
}

/**
 * A new node lost a uniqueness race and was removed again.
 */
export function logUniqueRollback(typeName: string, property: string): void {
  if (!enabled('warn')) return;
  console.warn(
    line(c.green('SAVE'), `${c.yellow('⊘ Rolled back')} new ${typeName}: ${property} is already taken`)
  );
}

/**
 * An update hit a uniqueness conflict. The stored properties keep the
 * new values; the conflicting index entry is not written.
 */
export function logUpdateConflict(typeName: string, id: string, property: string): void {
  if (!enabled('warn')) return;
  console.warn(
    line(
      c.green('SAVE'),
      `${c.yellow('! Conflict')} on ${typeName} ${c.dim(`[${shortId(id)}]`)}: ${property} is already taken, properties were kept`
    )
  );
}
