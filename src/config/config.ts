/**
 * Config Loader
 *
 * Loads the connection settings either from a JSON file named by
 * CARTOGRAPH_CONFIG (with {env:VAR} resolution) or from NEO4J_* variables.
 * Nothing is read at import time.
 */

import { readFileSync } from 'node:fs';
import { type Config, configSchema } from './schema';

export type Environment = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string, env: Environment = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

/**
 * Validate raw config data.
 * @throws ConfigError listing every failed check
 */
export function parseConfig(data: unknown): Config {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError('Invalid config:', issues);
  }
  return result.data;
}

/**
 * Load and validate config from file.
 */
export function loadConfigFile(configPath: string, env: Environment = process.env): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch (err) {
    throw new ConfigError(
      `Invalid JSON in config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseConfig(data);
}

/**
 * Build config from NEO4J_URL, NEO4J_USER, NEO4J_PASSWORD, NEO4J_DATABASE
 * and CARTOGRAPH_LOG_LEVEL.
 */
export function loadConfigFromEnv(env: Environment = process.env): Config {
  const url = env['NEO4J_URL'];
  if (!url) {
    throw new ConfigError('NEO4J_URL is not set');
  }

  return parseConfig({
    neo4j: {
      url,
      user: env['NEO4J_USER'],
      password: env['NEO4J_PASSWORD'],
      database: env['NEO4J_DATABASE']
    },
    logging: { level: env['CARTOGRAPH_LOG_LEVEL'] || undefined }
  });
}

export function loadConfig(env: Environment = process.env): Config {
  const configPath = env['CARTOGRAPH_CONFIG'];
  return configPath ? loadConfigFile(configPath, env) : loadConfigFromEnv(env);
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/** Drop the cached config so the next getConfig() reads it again */
export function resetConfig(): void {
  cachedConfig = null;
}
