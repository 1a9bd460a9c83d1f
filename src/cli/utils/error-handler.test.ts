// Tests for CLI error formatting

import { afterEach, describe, it, expect, vi } from 'vitest';
import { exitCodeForError, formatError, handleError } from './error-handler.js';
import { LogLevel, Logger } from '../../core/logger.js';
import { ConfigError, ProbeRuntimeError, ValidationError } from '../../core/errors.js';

describe('formatError', () => {
  it('should format each error family', () => {
    expect(formatError(new ValidationError('Invalid version: "x"', 'version'))).toBe(
      'Validation Error (field: version): Invalid version: "x"'
    );
    expect(formatError(new ConfigError('Invalid YAML: bad', '/work/.preflight/config.yaml'))).toBe(
      'Config Error (/work/.preflight/config.yaml): Invalid YAML: bad'
    );
    expect(formatError(new ProbeRuntimeError('clang is not available'))).toBe(
      'Error [PROBE_RUNTIME_ERROR]: clang is not available'
    );
    expect(formatError(new Error('EACCES'))).toBe('Error: EACCES');
    expect(formatError('weird')).toBe('Unknown error: weird');
  });
});

describe('exitCodeForError', () => {
  it('should use the error exit code, 1 otherwise', () => {
    expect(exitCodeForError(new ConfigError('bad', 'c.yaml'))).toBe(2);
    expect(exitCodeForError(new ValidationError('bad'))).toBe(1);
    expect(exitCodeForError(new Error('x'))).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    Logger.configure({ level: LogLevel.WARN, write: undefined });
  });

  it('should print the error, log its JSON form and exit with its code', () => {
    const lines: string[] = [];
    Logger.configure({ level: LogLevel.DEBUG, write: line => lines.push(line) });
    const printed = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() => handleError(new ConfigError('Invalid YAML: bad', 'c.yaml'))).toThrow('exit 2');

    expect(printed).toHaveBeenCalledWith('\n❌ Config Error (c.yaml): Invalid YAML: bad\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[preflight] [DEBUG] Unhandled error {"name":"ConfigError","code":"CONFIG_ERROR"');
    expect(lines[0]).toContain('"context":{"configPath":"c.yaml"}');
  });
});
