/**
 * Command Loader - Command registry and execution
 */

import { ConfigurationError } from '@simbatch/core';
import type { CommandDefinition, LoadedCommand } from './command-definition';
import { ArgumentError, createArgParser, generateHelp } from './io/arg-parser';
import { printError, printInfo } from './io/cli-logger';

/**
 * Close a definition over its option types
 */
export function defineCommand<TOptions, TInput>(definition: CommandDefinition<TOptions, TInput>): LoadedCommand {
  const parse = createArgParser(definition);

  return {
    name: definition.name,
    description: definition.description,
    help: () => generateHelp(definition),
    execute: async (argv) => definition.handler(parse(argv)),
  };
}

/**
 * Execute a command with full lifecycle management
 *
 * @returns the process exit code
 */
export async function executeCommand(command: LoadedCommand, argv: string[]): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(command.help());
    return 0;
  }

  try {
    return await command.execute(argv);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(error.toString());
    } else if (error instanceof ArgumentError) {
      printError(error.message);
      printInfo(`Run 'simbatch ${command.name} --help' for usage.`);
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

/**
 * Generate the overview printed by `simbatch --help`
 */
export function generateGlobalHelp(commands: readonly LoadedCommand[]): string {
  const width = Math.max(...commands.map(command => command.name.length)) + 2;
  const lines = [
    'Usage: simbatch <command> [options]',
    '',
    'COMMANDS:',
    ...commands.map(command => `  ${command.name.padEnd(width)}${command.description}`),
    '',
    'GLOBAL OPTIONS:',
    '  -h, --help     Show help (also after a command)',
    '  --version      Show version',
  ];
  return lines.join('\n');
}
