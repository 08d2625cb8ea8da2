/**
 * Terminal Colors
 *
 * ANSI color codes for log output. Colors are dropped when NO_COLOR is
 * set or stdout is not a terminal.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Codes
// ═══════════════════════════════════════════════════════════════════════════════

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m'
} as const;

export type ColorName = keyof typeof colors;

let enabled = process.env['NO_COLOR'] === undefined && process.stdout.isTTY === true;

/** Force colors on or off, e.g. for tests that assert on log lines */
export function setColorEnabled(value: boolean): void {
  enabled = value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Color Functions
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Apply a color to text.
 */
export function colorize(text: string, color: ColorName): string {
  if (!enabled) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════════════════

export const c = {
  dim: (text: string) => colorize(text, 'dim'),

  red: (text: string) => colorize(text, 'red'),
  green: (text: string) => colorize(text, 'green'),
  yellow: (text: string) => colorize(text, 'yellow'),
  magenta: (text: string) => colorize(text, 'magenta'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),

  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightGreen: (text: string) => colorize(text, 'brightGreen')
} as const;
