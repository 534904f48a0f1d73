/**
 * simbatch CLI entry point
 */

import { main } from './main';
import { printError } from './core/io/cli-logger';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
);
