/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * A command pairs a declarative argument specification (for parsing and
 * help) with a zod schema (for validation) and a handler that returns the
 * process exit code.
 */

import type { z } from 'zod';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean' | 'number';
  description: string;
  default?: string | boolean | number;
  required?: boolean;
}

/**
 * Declarative argument specification
 */
export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
}

/**
 * Complete command definition with all metadata
 *
 * @template TOptions - What the handler receives after schema processing
 * @template TInput - What the schema accepts from the parser
 */
export interface CommandDefinition<TOptions, TInput = TOptions> {
  name: string;
  description: string;
  schema: z.ZodType<TOptions, z.ZodTypeDef, TInput>;
  argSpec: ArgSpec;
  examples: string[];
  handler: (options: TOptions) => Promise<number>;
}

/**
 * A command ready to run, with its option types closed over
 */
export interface LoadedCommand {
  name: string;
  description: string;
  help(): string;
  execute(argv: string[]): Promise<number>;
}

/**
 * Shared by every command
 */
export const BASE_ARGS: Record<string, ArgDefinition> = {
  '--verbose': { type: 'boolean', description: 'Log debug output', default: false },
};

export const BASE_ALIASES: Record<string, string> = {
  '-v': '--verbose',
};
