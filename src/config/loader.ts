/**
 * Configuration loader
 *
 * Loads configuration from files, environment variables, and CLI arguments,
 * merging them in order of precedence.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import type { CliConfigOverrides, GeneratorConfig, PartialGeneratorConfig } from './types.js';
import { getDefaultConfig } from './defaults.js';
import { getErrorMessage } from '../utils/error-utils.js';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = ['pipewright.config.yaml', 'pipewright.config.yml'];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'PW_';

const configSchema = z
  .object({
    indent: z.coerce.number().int().min(0).max(16),
    header: z.boolean(),
    sectionComments: z.boolean(),
    timestamp: z.boolean(),
  })
  .strict();

const fileConfigSchema = configSchema.partial();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * @throws ConfigError when a source holds an unknown key or an invalid value
 */
export async function loadConfig(
  cliOverrides?: CliConfigOverrides,
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<GeneratorConfig> {
  let config: PartialGeneratorConfig = getDefaultConfig();

  const fileConfig = await loadConfigFile(configPath);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(env));

  if (cliOverrides) {
    config = mergeConfig(config, convertCliOverrides(cliOverrides));
  }

  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load configuration from file. An explicit path must exist; otherwise the
 * current directory is searched and a missing file is not an error.
 */
async function loadConfigFile(configPath?: string): Promise<PartialGeneratorConfig | null> {
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return loadConfigFromPath(absolutePath);
  }

  const cwd = process.cwd();
  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return null;
}

/**
 * Load configuration from a specific YAML file
 */
async function loadConfigFromPath(filePath: string): Promise<PartialGeneratorConfig | null> {
  let raw: unknown;
  try {
    const content = await fs.promises.readFile(filePath, 'utf8');
    raw = YAML.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to read ${filePath}: ${getErrorMessage(error)}`);
  }

  // Empty file
  if (raw === undefined || raw === null) {
    return null;
  }

  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): PartialGeneratorConfig {
  const config: PartialGeneratorConfig = {};

  const indent = env[`${ENV_PREFIX}INDENT`];
  if (indent !== undefined && indent !== '') {
    config.indent = parseInteger(indent, `${ENV_PREFIX}INDENT`);
  }

  const header = env[`${ENV_PREFIX}HEADER`];
  if (header !== undefined && header !== '') {
    config.header = parseBoolean(header, `${ENV_PREFIX}HEADER`);
  }

  const timestamp = env[`${ENV_PREFIX}TIMESTAMP`];
  if (timestamp !== undefined && timestamp !== '') {
    config.timestamp = parseBoolean(timestamp, `${ENV_PREFIX}TIMESTAMP`);
  }

  return config;
}

/**
 * Convert CLI overrides to partial config
 */
function convertCliOverrides(overrides: CliConfigOverrides): PartialGeneratorConfig {
  const config: PartialGeneratorConfig = {};

  if (overrides.indent !== undefined) {
    config.indent =
      typeof overrides.indent === 'number' ? overrides.indent : parseInteger(overrides.indent, '--indent');
  }
  if (overrides.header !== undefined) config.header = overrides.header;
  if (overrides.sectionComments !== undefined) config.sectionComments = overrides.sectionComments;
  if (overrides.timestamp !== undefined) config.timestamp = overrides.timestamp;

  return config;
}

/**
 * Shallow merge; undefined values in `override` keep the base value
 */
function mergeConfig(
  base: PartialGeneratorConfig,
  override: PartialGeneratorConfig
): PartialGeneratorConfig {
  const merged = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

function parseInteger(value: string, source: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${source} must be an integer, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(value: string, source: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${source} must be a boolean, got "${value}"`);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
