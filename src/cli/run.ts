import { handleAddCommand, printAddHelp } from './add-command.js';
import { handleCleanCommand, printCleanHelp } from './clean-command.js';
import { handleDoneCommand, printDoneHelp } from './done-command.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags } from './flag-utils.js';
import { printHelp, printVersion } from './help.js';
import { handleInitCommand, printInitHelp } from './init-command.js';
import { handleListCommand, printListHelp } from './list-command.js';
import { handleUpdateCommand, printUpdateHelp } from './update-command.js';

export const VERSION = '0.1.0';

interface CommandSpec {
  handle: (args: string[]) => void;
  printHelp: () => void;
}

const COMMANDS: Record<string, CommandSpec> = {
  init: { handle: handleInitCommand, printHelp: printInitHelp },
  add: { handle: handleAddCommand, printHelp: printAddHelp },
  update: { handle: handleUpdateCommand, printHelp: printUpdateHelp },
  done: { handle: handleDoneCommand, printHelp: printDoneHelp },
  list: { handle: handleListCommand, printHelp: printListHelp },
  clean: { handle: handleCleanCommand, printHelp: printCleanHelp },
};

const ALIASES: Record<string, string> = {
  scan: 'init',
  status: 'list',
  complete: 'done',
};

/**
 * Run one CLI invocation and return the process exit code.
 * Per-file problems are warnings (exit 0); usage, root and single-file errors exit 1.
 */
export function runCli(argv: readonly string[]): number {
  const args = [...argv];

  if (args.length === 0) {
    printHelp();
    return 1;
  }

  // Global help/version only count before the command
  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return 0;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return 0;
  }

  const commandName = args.shift() ?? '';
  if (commandName === 'help') {
    printHelp();
    return 0;
  }

  const command = COMMANDS[ALIASES[commandName] ?? commandName];
  if (!command) {
    printHelp(`Unknown command '${commandName}'.`);
    return 1;
  }

  const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
  if (helpFlags.size > 0) {
    command.printHelp();
    return 0;
  }

  try {
    command.handle(args);
    return 0;
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      return 1;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
