/**
 * Terminal Color Utility Tests
 *
 * Tests for ANSI color codes and the on/off switch.
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { c, colorize, colors, setColorEnabled } from '@/utils/colors';

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Code Constants
// ═══════════════════════════════════════════════════════════════════════════════

describe('colors constants', () => {
  test('reset and dim codes are correct', () => {
    expect(colors.reset).toBe('\x1b[0m');
    expect(colors.dim).toBe('\x1b[2m');
  });

  test('standard colors are defined', () => {
    expect(colors.red).toBe('\x1b[31m');
    expect(colors.green).toBe('\x1b[32m');
    expect(colors.yellow).toBe('\x1b[33m');
    expect(colors.magenta).toBe('\x1b[35m');
    expect(colors.cyan).toBe('\x1b[36m');
    expect(colors.white).toBe('\x1b[37m');
  });

  test('bright colors are defined', () => {
    expect(colors.brightRed).toBe('\x1b[91m');
    expect(colors.brightGreen).toBe('\x1b[92m');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Colorize Function
// ═══════════════════════════════════════════════════════════════════════════════

describe('colorize', () => {
  beforeEach(() => {
    setColorEnabled(true);
  });

  afterEach(() => {
    setColorEnabled(false);
  });

  test('applies color with reset suffix', () => {
    expect(colorize('hello', 'red')).toBe('\x1b[31mhello\x1b[0m');
  });

  test('works with dim modifier', () => {
    expect(colorize('text', 'dim')).toBe('\x1b[2mtext\x1b[0m');
  });

  test('handles empty string', () => {
    expect(colorize('', 'green')).toBe('\x1b[32m\x1b[0m');
  });

  test('returns plain text when disabled', () => {
    setColorEnabled(false);
    expect(colorize('hello', 'red')).toBe('hello');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════════════════

describe('c convenience functions', () => {
  beforeEach(() => {
    setColorEnabled(true);
  });

  afterEach(() => {
    setColorEnabled(false);
  });

  test('each helper wraps with its own code', () => {
    expect(c.dim('x')).toBe('\x1b[2mx\x1b[0m');
    expect(c.yellow('x')).toBe('\x1b[33mx\x1b[0m');
    expect(c.magenta('x')).toBe('\x1b[35mx\x1b[0m');
    expect(c.brightGreen('x')).toBe('\x1b[92mx\x1b[0m');
  });

  test('helpers can be nested', () => {
    expect(c.cyan(c.white('x'))).toBe('\x1b[36m\x1b[37mx\x1b[0m\x1b[0m');
  });
});
