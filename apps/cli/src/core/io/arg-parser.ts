/**
 * Argument Parser - Functional parser generator for CLI arguments
 *
 * Generates argument parsers from declarative command definitions: arg does
 * the tokenizing, zod does the validation.
 */

import arg from 'arg';
import { z } from 'zod';
import type { ArgSpec, CommandDefinition } from '../command-definition';

/**
 * Type mapping from our declarative types to arg library types
 */
const ARG_TYPE_MAP = {
  string: String,
  boolean: Boolean,
  number: Number,
};

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Create a parser function for a command
 *
 * @throws ArgumentError for unknown flags, missing values or schema violations
 */
export function createArgParser<TOptions, TInput>(
  command: Pick<CommandDefinition<TOptions, TInput>, 'argSpec' | 'schema'>
): (argv: string[]) => TOptions {
  const argSpec = buildArgSpec(command.argSpec);

  return (argv: string[]) => {
    try {
      const rawArgs = arg(argSpec, { argv, permissive: false });

      const [unexpected] = rawArgs._;
      if (unexpected !== undefined) {
        throw new ArgumentError(`Invalid arguments: unexpected argument '${unexpected}'`);
      }

      return command.schema.parse(normalizeArgs(rawArgs, command.argSpec));
    } catch (error) {
      if (error instanceof arg.ArgError) {
        throw new ArgumentError(`Invalid arguments: ${error.message}`);
      }
      if (error instanceof z.ZodError) {
        const issues = error.issues
          .map(i => `  ${i.path.length > 0 ? `${i.path.join('.')}: ` : ''}${i.message}`)
          .join('\n');
        throw new ArgumentError(`Invalid arguments:\n${issues}`);
      }
      throw error;
    }
  };
}

/**
 * Build arg library specification from our declarative format
 */
function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};

  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }

  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }

  return result;
}

/**
 * Normalize parsed arguments to match zod schema expectations
 *
 * The arg library returns arguments with '--' prefix, but our schemas
 * expect camelCase property names.
 */
function normalizeArgs(rawArgs: Record<string, unknown>, spec: ArgSpec): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(rawArgs)) {
    if (key === '_' || value === undefined) continue;
    normalized[kebabToCamel(key.replace(/^--/, ''))] = value;
  }

  for (const [key, def] of Object.entries(spec.args)) {
    const normalizedKey = kebabToCamel(key.replace(/^--/, ''));
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

/**
 * Convert kebab-case to camelCase
 */
export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Generate help text from command definition
 */
export function generateHelp(
  command: Pick<CommandDefinition<unknown>, 'name' | 'description' | 'argSpec' | 'examples'>
): string {
  const lines: string[] = [];

  lines.push(`${command.name} - ${command.description}`);
  lines.push('');
  lines.push('OPTIONS:');

  const keys = Object.entries(command.argSpec.args).map(([key]) => {
    const aliases = findAliases(key, command.argSpec.aliases);
    return aliases.length > 0 ? `${aliases.join(', ')}, ${key}` : key;
  });
  const width = Math.max(...keys.map(k => k.length)) + 2;

  Object.values(command.argSpec.args).forEach((def, i) => {
    let description = def.description;
    if (def.default !== undefined && def.default !== false) {
      description += ` [default: ${String(def.default)}]`;
    }
    if (def.required) {
      description += ' (required)';
    }
    lines.push(`  ${(keys[i] ?? '').padEnd(width)}${description}`);
  });

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

/**
 * Find aliases for a given argument key
 */
function findAliases(key: string, aliases?: Record<string, string>): string[] {
  if (!aliases) return [];

  return Object.entries(aliases)
    .filter(([, target]) => target === key)
    .map(([alias]) => alias);
}
