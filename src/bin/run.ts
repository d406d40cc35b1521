/**
 * Process boundary: turns a parse outcome into output, exit codes and the
 * action call.
 */

import { parse } from '@/core/parser';
import { fromList, fromProcess } from '@/core/sources';
import type { Command, HelpRenderer } from '@/types';
import { printCommandHelp } from './help';
import { errorColors } from './utils/colors';

export interface RunOptions {
  /** Tokens including the program name (default: process.argv.slice(1)) */
  argv?: readonly string[];
  /** Help renderer (default: printCommandHelp) */
  renderHelp?: HelpRenderer;
  /** Process exit (override for testing) */
  exit?: (code: number) => never;
  /** Error line writer (default: console.error) */
  stderr?: (line: string) => void;
}

/**
 * Parse the process arguments and invoke the resolved action.
 *
 * Prints help and exits 0 when the help option fires; prints
 * `ERROR: <message>` and exits 1 on a parse failure. Otherwise returns
 * whatever the action returns, and lets anything it throws propagate.
 */
export async function run(root: Command, options: RunOptions = {}): Promise<unknown> {
  const renderHelp = options.renderHelp ?? printCommandHelp;
  const exit = options.exit ?? ((code: number): never => process.exit(code));
  const stderr = options.stderr ?? ((line: string) => console.error(line));
  // Only the default writer goes to process.stderr, whose TTY state decides coloring
  const errorLabel = options.stderr ? 'ERROR:' : errorColors.red(errorColors.bold('ERROR:'));

  const source = options.argv ? fromList(options.argv) : fromProcess();
  const outcome = parse(root, source);
  switch (outcome.kind) {
    case 'help':
      renderHelp(outcome.command, outcome.path);
      return exit(0);
    case 'error':
      stderr(`${errorLabel} ${outcome.error.message}`);
      return exit(1);
    case 'action':
      return await outcome.action(outcome.args, {
        command: outcome.command,
        path: outcome.path,
        values: outcome.values,
      });
  }
}
