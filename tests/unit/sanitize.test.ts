/**
 * Unit tests for sanitization utilities
 */

import { describe, it, expect } from 'vitest';
import {
  escapeShellArg,
  escapeTmuxArgument,
  findControlByte,
  isSafeSignalName,
  parseTmuxArgument,
} from '../../src/utils/sanitize';

describe('escapeShellArg', () => {
  describe('safe characters', () => {
    it('should not escape alphanumeric characters', () => {
      expect(escapeShellArg('test123')).toBe('test123');
    });

    it('should not escape hyphen, underscore, dot or slash', () => {
      expect(escapeShellArg('/usr/bin/tmux-3.4_x')).toBe('/usr/bin/tmux-3.4_x');
    });
  });

  describe('unsafe characters', () => {
    it('should quote spaces', () => {
      expect(escapeShellArg('a b')).toBe("'a b'");
    });

    it('should escape single quotes', () => {
      expect(escapeShellArg("it's")).toBe("'it'\\''s'");
    });

    it('should quote shell metacharacters', () => {
      expect(escapeShellArg('$(rm -rf)')).toBe("'$(rm -rf)'");
    });
  });

  it('should return empty quotes for an empty string', () => {
    expect(escapeShellArg('')).toBe("''");
  });
});

describe('escapeTmuxArgument', () => {
  it('should leave arguments without a trailing semicolon alone', () => {
    expect(escapeTmuxArgument('echo a; echo b')).toBe('echo a; echo b');
  });

  it('should escape a trailing semicolon', () => {
    expect(escapeTmuxArgument('echo a;')).toBe('echo a\\;');
    expect(escapeTmuxArgument(';')).toBe('\\;');
  });

  it('should be undone by the tmux parser', () => {
    for (const arg of ['plain', 'end;', ';', 'a\\;', 'x ;']) {
      expect(parseTmuxArgument(escapeTmuxArgument(arg))).toBe(arg);
    }
  });
});

describe('parseTmuxArgument', () => {
  it('should read a bare trailing semicolon as a separator', () => {
    expect(parseTmuxArgument('echo;')).toBeNull();
  });

  it('should read an escaped semicolon as data', () => {
    expect(parseTmuxArgument('echo\\;')).toBe('echo;');
  });
});

describe('findControlByte', () => {
  it('should return -1 for printable text, tabs and newlines', () => {
    expect(findControlByte('plain\ttext\nmore')).toBe(-1);
  });

  it('should find the first control byte', () => {
    expect(findControlByte('ok\x03then\x1b')).toBe(2);
    expect(findControlByte('\r')).toBe(0);
    expect(findControlByte('abc\x7f')).toBe(3);
  });
});

describe('isSafeSignalName', () => {
  it('should accept word characters, dots and dashes', () => {
    expect(isSafeSignalName('pane-task-1.done_x')).toBe(true);
  });

  it('should reject spaces, quotes and empty names', () => {
    expect(isSafeSignalName('two words')).toBe(false);
    expect(isSafeSignalName("it's")).toBe(false);
    expect(isSafeSignalName('')).toBe(false);
  });

  it('should reject names longer than 128 characters', () => {
    expect(isSafeSignalName('a'.repeat(128))).toBe(true);
    expect(isSafeSignalName('a'.repeat(129))).toBe(false);
  });
});
