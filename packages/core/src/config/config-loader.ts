/**
 * Batch configuration loading
 *
 * parseBatchConfig is pure (YAML text in, resolved config out) so it can be
 * tested without touching the filesystem; loadBatchConfig is the filesystem
 * wrapper used by the CLI.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { validateBatchConfig } from './config-validator';
import { ConfigurationError } from './configuration-error';
import { DEFAULT_SERVICE_OPTIONS, type BatchConfig, type BatchConfigFile } from './config.types';

export interface ConfigOverrides {
  /** Replaces the `output` key (the CLI's --output flag) */
  output?: string;
  /** Base directory for relative paths; defaults to the working directory */
  cwd?: string;
}

/**
 * Parse, validate and resolve a YAML batch configuration
 *
 * @param content - YAML text
 * @param source - Where the text came from, for error messages
 * @throws ConfigurationError on invalid YAML or schema violations
 */
export function parseBatchConfig(content: string, source: string, overrides: ConfigOverrides = {}): BatchConfig {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in config file: ${error instanceof Error ? error.message : String(error)}`,
      source,
      'Check the file for indentation or quoting mistakes',
      error instanceof Error ? error : undefined
    );
  }

  // An empty document is treated like an empty mapping so the schema can
  // report the missing required keys.
  const result = validateBatchConfig(data ?? {});
  if (!result.valid) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.errorMessage}`,
      source,
      'Fix the listed keys; this_quarter_groups is required'
    );
  }

  return resolveBatchConfig(result.config, overrides);
}

/**
 * Turn a validated config file into the resolved configuration
 */
export function resolveBatchConfig(file: BatchConfigFile, overrides: ConfigOverrides = {}): BatchConfig {
  const cwd = overrides.cwd ?? process.cwd();

  return {
    language: file.lang,
    outputDir: path.resolve(cwd, overrides.output ?? file.output),
    filesDir: path.resolve(cwd, file.files),
    cooldownSeconds: file.moss_request_cooldown,
    baseRepos: file.base_repos,
    baseFilePatterns: file.base_files,
    gitlabGroup: file.gitlab_group,
    currentGroups: file.this_quarter_groups ?? [],
    previousGroups: file.previous_quarter_groups ?? [],
    branch: file.assignment_branch,
    assignmentPath: file.assignment_path,
    filePatterns: file.assignment_files,
    maxBatchFiles: file.max_batch_files,
    minChunkFiles: file.min_chunk_files,
    downloadConnections: file.download_connections,
    serviceOptions: { ...DEFAULT_SERVICE_OPTIONS, ...file.moss_options },
    logLevel: file.log_level,
  };
}

/**
 * Load batch configuration from disk
 *
 * @throws ConfigurationError if the file cannot be read or is invalid
 */
export function loadBatchConfig(configPath: string, overrides: ConfigOverrides = {}): BatchConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Could not open the config file ${configPath}`,
      configPath,
      'Pass an existing YAML file with --config',
      error instanceof Error ? error : undefined
    );
  }

  return parseBatchConfig(content, configPath, overrides);
}
