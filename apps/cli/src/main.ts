/**
 * CLI dispatch: global flags, command lookup, exit codes
 */

import pkg from '../package.json';
import { COMMANDS, findCommand } from './commands';
import { executeCommand, generateGlobalHelp } from './core/command-loader';
import { getPreamble, getPreambleSeparator } from './core/io/cli-colors';
import { printError } from './core/io/cli-logger';

export const VERSION = pkg.version;

function printHelp(): void {
  console.log(getPreamble(VERSION));
  console.log(getPreambleSeparator());
  console.log();
  console.log(generateGlobalHelp(COMMANDS));
}

/**
 * @returns the process exit code
 */
export async function main(args: string[]): Promise<number> {
  const [command] = args;

  if (command === undefined || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  if (command === '--version') {
    console.log(`simbatch v${VERSION}`);
    return 0;
  }

  const loaded = findCommand(command);
  if (!loaded) {
    printError(`Unknown command: ${command}`);
    console.log(`Available commands: ${COMMANDS.map(c => c.name).join(', ')}`);
    console.log(`Run 'simbatch --help' for more information.`);
    return 1;
  }

  return executeCommand(loaded, args.slice(1));
}
