/**
 * Configuration loader
 *
 * Reads bellman.config.yml (or an explicit path) and validates it.
 * A missing default file means "use defaults"; a missing explicit file
 * is an error.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse as parseYAML } from 'yaml';
import type { BellmanConfig } from '@bellman/mdp-contracts';
import { ConfigError, DEFAULT_CONFIG_FILE, validateBellmanConfig } from '@bellman/mdp-contracts';

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit config path, relative to cwd */
  configPath?: string;
}

export interface LoadedConfig {
  config: BellmanConfig;
  /** Absolute path of the file read, undefined when defaults were used */
  source?: string;
}

export function parseConfigText(text: string, source?: string): BellmanConfig {
  let raw: unknown;
  try {
    raw = parseYAML(text);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }

  const result = validateBellmanConfig(raw);
  if (!result.success || !result.data) {
    const issues = result.error?.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues ?? 'unknown error'}`, source);
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const explicit = options.configPath !== undefined;
  const filePath = explicit
    ? resolve(options.cwd, options.configPath ?? '')
    : join(options.cwd, DEFAULT_CONFIG_FILE);

  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (!explicit && (error as NodeJS.ErrnoException).code === 'ENOENT') {
      return { config: parseConfigText('') };
    }
    throw new ConfigError(
      `Cannot read config: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  return { config: parseConfigText(text, filePath), source: filePath };
}
