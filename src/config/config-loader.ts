/**
 * Config Loader - Loads and validates the YAML configuration file
 * Environment variables override file values before validation
 */

import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { validateConfigSafe, type AppConfig } from '../schemas/config.schema.js';

export const DEFAULT_CONFIG_PATH = 'config/copilot.yaml';

/**
 * Error thrown when the configuration cannot be read, parsed or validated
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Environment variables that override file values
 * Maps variable name → [section, key]
 */
const ENV_OVERRIDES: Record<string, [string, string]> = {
  OLLAMA_URL: ['completion', 'baseUrl'],
  OLLAMA_MODEL: ['completion', 'model'],
  MCP_SERVER_URL: ['tools', 'serverUrl'],
  CONTEXT_PROVIDER_URL: ['contextProvider', 'url'],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply environment overrides on top of the raw YAML document
 *
 * @param raw - Parsed YAML document
 * @param env - Environment to read overrides from
 * @returns A new document; the input is not mutated
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  for (const [variable, [section, key]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value.trim() === '') continue;

    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), [key]: value.trim() };
  }

  return merged;
}

/**
 * Parse a YAML string into a validated AppConfig
 * Relative catalog paths are resolved against the config file's directory
 *
 * @param yamlContent - The raw YAML content
 * @param filePath - Path of the file (error messages and catalog resolution)
 * @param env - Environment used for overrides
 * @throws ConfigError if YAML parsing or schema validation fails
 */
export function parseConfigFromYaml(
  yamlContent: string,
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  let parsed: unknown;

  try {
    parsed = parseYaml(yamlContent);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigError('Configuration must be a YAML mapping', filePath);
  }

  const validation = validateConfigSafe(applyEnvOverrides(parsed, env));
  if (!validation.success) {
    const errorMessages = validation.error.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');

    throw new ConfigError(`Schema validation failed:\n${errorMessages}`, filePath);
  }

  const config = validation.data;
  const catalogPath = isAbsolute(config.tools.catalogPath)
    ? config.tools.catalogPath
    : resolve(dirname(filePath), config.tools.catalogPath);

  return { ...config, tools: { ...config.tools, catalogPath } };
}

/**
 * Load and parse the configuration from a file path
 *
 * @param filePath - The path to the YAML file
 * @param env - Environment used for overrides
 * @throws ConfigError if the file cannot be read or is invalid
 */
export async function loadConfigFromFile(
  filePath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const absolutePath = resolve(filePath);

  let yamlContent: string;
  try {
    yamlContent = await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
      absolutePath
    );
  }

  return parseConfigFromYaml(yamlContent, absolutePath, env);
}
