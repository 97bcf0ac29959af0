/**
 * Command tree for the losp CLI
 */

import { Command } from 'commander';
import { startRepl } from './repl.js';
import { runFile } from './run.js';

export interface ProgramSettings {
  /** Throw a CommanderError instead of exiting on usage errors */
  exitOverride?: boolean;
  /** Help and usage output */
  writeOut?: (text: string) => void;
  /** Usage error output */
  writeErr?: (text: string) => void;
}

function fail(error: unknown): never {
  if (error instanceof Error) {
    console.error('Error:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
  } else {
    console.error('Error:', String(error));
  }
  process.exit(1);
}

function runOrFail(file: string, trace: boolean): void {
  try {
    runFile(file, { trace });
  } catch (error) {
    fail(error);
  }
}

/**
 * Subcommands inherit the exit and output settings, so they are applied
 * before any subcommand is added.
 */
export function createProgram(settings: ProgramSettings = {}): Command {
  const program = new Command();

  program
    .name('losp')
    .description('Bytecode compiler and virtual machine for the losp language')
    .showHelpAfterError();

  if (settings.exitOverride) {
    program.exitOverride();
  }
  if (settings.writeOut) {
    program.configureOutput({ writeOut: settings.writeOut });
  }
  if (settings.writeErr) {
    program.configureOutput({ writeErr: settings.writeErr });
  }

  program
    .command('repl')
    .description('Start an interactive session')
    .allowExcessArguments(false)
    .action(async () => {
      await startRepl({ trace: false });
    });

  program
    .command('run')
    .description('Run a program file')
    .argument('<file>', 'Program file')
    .allowExcessArguments(false)
    .action((file: string) => {
      runOrFail(file, false);
    });

  program
    .command('debug')
    .description('Run a program file, or an interactive session, tracing every instruction')
    .argument('[file]', 'Program file')
    .allowExcessArguments(false)
    .action(async (file: string | undefined) => {
      if (file) {
        runOrFail(file, true);
      } else {
        await startRepl({ trace: true });
      }
    });

  return program;
}
