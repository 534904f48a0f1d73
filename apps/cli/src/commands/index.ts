import type { LoadedCommand } from '../core/command-definition';
import { runCommand } from './run';
import { statusCommand } from './status';

export const COMMANDS: readonly LoadedCommand[] = [runCommand, statusCommand];

export function findCommand(name: string): LoadedCommand | undefined {
  return COMMANDS.find(command => command.name === name);
}
