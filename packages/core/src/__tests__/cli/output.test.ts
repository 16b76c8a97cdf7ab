/**
 * CLI Output Utilities Tests
 *
 * Tests for terminal output formatting functions.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  paint,
  error,
  warning,
  info,
  header,
  table,
  json,
  truncate,
  formatMicros,
  formatTimestamp,
  exitWithError,
} from '../../cli/utils/output.js';

// =============================================================================
// Test Setup
// =============================================================================

describe('CLI Output Utilities', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  const originalNoColor = process.env.NO_COLOR;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    process.env.NO_COLOR = '1';
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalNoColor === undefined) {
      delete process.env.NO_COLOR;
    } else {
      process.env.NO_COLOR = originalNoColor;
    }
  });

  // ===========================================================================
  // paint()
  // ===========================================================================

  describe('paint', () => {
    it('should wrap text in ANSI codes', () => {
      delete process.env.NO_COLOR;

      expect(paint('cyan', 'ok')).toBe('\x1b[36mok\x1b[0m');
      expect(paint('bold', 'title')).toBe('\x1b[1mtitle\x1b[0m');
    });

    it('should return plain text when NO_COLOR is set', () => {
      expect(paint('red', 'plain')).toBe('plain');
    });

    it('should color status lines', () => {
      delete process.env.NO_COLOR;

      warning('Careful');
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[33m⚠ Careful\x1b[0m');
    });
  });

  // ===========================================================================
  // Messages
  // ===========================================================================

  describe('messages', () => {
    it('should print errors to stderr', () => {
      error('Broken');
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Broken');
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should print warnings', () => {
      warning('Careful');
      expect(consoleLogSpy).toHaveBeenCalledWith('⚠ Careful');
    });

    it('should print info', () => {
      info('Note');
      expect(consoleLogSpy).toHaveBeenCalledWith('ℹ Note');
    });
  });

  // ===========================================================================
  // header()
  // ===========================================================================

  describe('header', () => {
    it('should print a blank line, the text and an underline', () => {
      header('Traces');

      expect(consoleLogSpy.mock.calls).toEqual([[''], ['Traces'], ['─'.repeat(10)]]);
    });

    it('should cap the underline at 60 characters', () => {
      header('x'.repeat(80));

      expect(consoleLogSpy).toHaveBeenLastCalledWith('─'.repeat(60));
    });
  });

  // ===========================================================================
  // table()
  // ===========================================================================

  describe('table', () => {
    it('should pad text columns and right-align numeric ones', () => {
      table([
        { service: 'frontend', calls: 12 },
        { service: 'db', calls: 3 },
      ]);

      expect(consoleLogSpy.mock.calls).toEqual([
        ['service   calls'],
        ['─'.repeat(8) + '──' + '─'.repeat(5)],
        ['frontend     12'],
        ['db            3'],
      ]);
    });

    it('should treat a column mixing text and numbers as text', () => {
      table([{ id: 'abc' }, { id: 7 }]);

      expect(consoleLogSpy).toHaveBeenLastCalledWith('7  ');
    });

    it('should render undefined cells as empty', () => {
      table([{ name: 'a', note: undefined }]);

      expect(consoleLogSpy).toHaveBeenLastCalledWith('a' + ' '.repeat(9));
    });

    it('should print nothing for no rows', () => {
      table([]);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // json()
  // ===========================================================================

  describe('json', () => {
    it('should pretty print by default', () => {
      json({ a: 1 });
      expect(consoleLogSpy).toHaveBeenCalledWith('{\n  "a": 1\n}');
    });

    it('should print compact JSON when asked', () => {
      json({ a: 1 }, false);
      expect(consoleLogSpy).toHaveBeenCalledWith('{"a":1}');
    });

    it('should write bigints as decimal strings', () => {
      json({ spanId: 18446744073709551615n }, false);
      expect(consoleLogSpy).toHaveBeenCalledWith('{"spanId":"18446744073709551615"}');
    });
  });

  // ===========================================================================
  // Formatting
  // ===========================================================================

  describe('truncate', () => {
    it('should keep short text', () => {
      expect(truncate('short', 10)).toBe('short');
    });

    it('should cut long text with an ellipsis', () => {
      expect(truncate('a long operation name', 10)).toBe('a long op…');
    });
  });

  describe('formatMicros', () => {
    it('should format each magnitude', () => {
      expect(formatMicros(250)).toBe('250µs');
      expect(formatMicros(1500)).toBe('1.50ms');
      expect(formatMicros(2_500_000)).toBe('2.50s');
      expect(formatMicros(90_000_000)).toBe('1m 30s');
    });
  });

  describe('formatTimestamp', () => {
    it('should drop zero milliseconds', () => {
      expect(formatTimestamp(new Date('2024-03-01T12:00:00.000Z'))).toBe('2024-03-01T12:00:00Z');
    });

    it('should keep non-zero milliseconds', () => {
      expect(formatTimestamp(new Date('2024-03-01T12:00:00.250Z'))).toBe(
        '2024-03-01T12:00:00.250Z'
      );
    });
  });

  // ===========================================================================
  // exitWithError()
  // ===========================================================================

  describe('exitWithError', () => {
    it('should print the error and exit with the given code', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });

      expect(() => exitWithError('Fatal', 2)).toThrow('process.exit called');
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Fatal');
      expect(exitSpy).toHaveBeenCalledWith(2);
    });
  });
});
