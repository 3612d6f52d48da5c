/**
 * Command-line arguments
 */

import type { ConsoleConfigOverrides } from '../config/console-config';

export type CliCommand = 'console' | 'regenerate' | 'status' | 'backup';

export const CLI_COMMANDS: readonly CliCommand[] = ['console', 'regenerate', 'status', 'backup'];

export interface ParsedArgs {
  command: CliCommand;
  overrides: ConsoleConfigOverrides;
  help?: boolean;
  version?: boolean;
}

/**
 * Invalid command line (exit code 2)
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

function isCliCommand(value: string): value is CliCommand {
  return (CLI_COMMANDS as readonly string[]).includes(value);
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = { command: 'console', overrides: {} };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--dir') {
      result.overrides.installDir = requireValue(args, i, arg);
      i++;
    } else if (arg === '--data-dir') {
      result.overrides.dataDir = requireValue(args, i, arg);
      i++;
    } else if (arg === '--catalog') {
      result.overrides.catalogPath = requireValue(args, i, arg);
      i++;
    } else if (arg === '--verbose') {
      result.overrides.verbose = true;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else if (!commandSeen && isCliCommand(arg)) {
      result.command = arg;
      commandSeen = true;
    } else {
      throw new CliUsageError(`Unknown command: ${arg}`);
    }
  }

  return result;
}
