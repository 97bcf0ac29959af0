/**
 * Command line argument handling tests
 */

import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { createProgram } from './program.js';

interface Outcome {
  error: CommanderError;
  out: string;
  err: string;
}

function usageError(args: string[]): Outcome {
  let out = '';
  let err = '';
  const program = createProgram({
    exitOverride: true,
    writeOut: (text) => (out += text),
    writeErr: (text) => (err += text),
  });
  try {
    program.parse(['node', 'losp', ...args]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return { error, out, err };
    }
    throw error;
  }
  throw new Error(`Expected a usage error for: ${args.join(' ')}`);
}

describe('createProgram', () => {
  it('should reject extra arguments to run before reading the file', () => {
    const { error, err } = usageError(['run', 'missing.losp', 'extra', 'junk']);
    expect(error.code).toBe('commander.excessArguments');
    expect(error.exitCode).toBe(1);
    expect(err).toContain("error: too many arguments for 'run'. Expected 1 argument but got 3.");
  });

  it('should reject extra arguments to repl and debug', () => {
    expect(usageError(['repl', 'extra']).error.code).toBe('commander.excessArguments');
    expect(usageError(['debug', 'missing.losp', 'extra']).error.code).toBe('commander.excessArguments');
  });

  it('should require a file for run', () => {
    const { error } = usageError(['run']);
    expect(error.code).toBe('commander.missingArgument');
    expect(error.exitCode).toBe(1);
  });

  it('should reject unknown commands', () => {
    const { error, err } = usageError(['bogus']);
    expect(error.code).toBe('commander.unknownCommand');
    expect(err).toContain("error: unknown command 'bogus'");
  });

  it('should list the subcommands in help', () => {
    const { error, out } = usageError(['--help']);
    expect(error.code).toBe('commander.helpDisplayed');
    expect(error.exitCode).toBe(0);
    expect(out).toContain('repl');
    expect(out).toContain('run <file>');
    expect(out).toContain('debug [file]');
  });
});
