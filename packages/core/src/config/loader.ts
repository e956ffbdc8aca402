/**
 * Configuration Loader
 *
 * Builds the application configuration from, in priority order:
 * - a JSON config file (flowkit.config.local.json, flowkit.config.json, config/flowkit.json)
 * - environment variables (a .env file is loaded through dotenv)
 * - schema defaults
 *
 * String values in the config file support ${VAR_NAME} substitution.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import dotenv from 'dotenv';
import { setLogLevel } from '../logger/index.js';
import { AppConfigSchema, type AppConfig } from './schema.js';

dotenv.config();

// =============================================================================
// Environment Variable Helpers
// =============================================================================

type Env = Record<string, string | undefined>;

/**
 * Substitute environment variables in a string
 * Supports ${VAR_NAME} syntax; unknown variables are left in place
 */
function substituteEnvVars(value: string, env: Env): string {
  return value.replace(/\$\{([^}]+)\}/g, (placeholder: string, varName: string) => {
    const envValue = env[varName];
    return envValue === undefined ? placeholder : envValue;
  });
}

/**
 * Deep substitute environment variables in a parsed JSON value
 */
export function deepSubstituteEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => deepSubstituteEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = deepSubstituteEnvVars(item, env);
    }
    return result;
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// =============================================================================
// Config File Loading
// =============================================================================

/**
 * Find the project root by looking for package.json
 */
function findProjectRoot(startDir: string): string {
  let currentDir = startDir;

  while (dirname(currentDir) !== currentDir) {
    if (existsSync(resolve(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return startDir;
}

/**
 * Possible config file locations (in priority order)
 */
export function getConfigPaths(cwd: string = process.cwd()): string[] {
  const projectRoot = findProjectRoot(cwd);
  return [
    resolve(projectRoot, 'flowkit.config.local.json'),
    resolve(projectRoot, 'flowkit.config.json'),
    resolve(projectRoot, 'config/flowkit.json'),
  ];
}

function loadConfigFile(paths: string[], env: Env): Record<string, unknown> | null {
  for (const configPath of paths) {
    if (!existsSync(configPath)) continue;

    const content = readFileSync(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON in config file ${configPath}: ${reason}`);
    }

    const substituted = deepSubstituteEnvVars(parsed, env);
    if (!isPlainObject(substituted)) {
      throw new Error(`Config file ${configPath} must contain a JSON object`);
    }
    return substituted;
  }
  return null;
}

// =============================================================================
// Config from Environment Variables
// =============================================================================

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const port = Number(raw);
  return Number.isInteger(port) ? port : undefined;
}

/**
 * Build config from environment variables.
 * A section is only emitted when its identifying variable is present.
 */
export function buildConfigFromEnv(env: Env = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.JIRA_HOST) {
    config.jira = {
      host: env.JIRA_HOST,
      email: env.JIRA_EMAIL,
      apiToken: env.JIRA_API_TOKEN,
    };
  }

  if (env.CONFLUENCE_BASE_URL) {
    config.confluence = {
      baseUrl: env.CONFLUENCE_BASE_URL,
      email: env.CONFLUENCE_EMAIL,
      apiToken: env.CONFLUENCE_API_TOKEN,
      defaultSpace: env.CONFLUENCE_DEFAULT_SPACE || undefined,
    };
  }

  const google: Record<string, unknown> = {};
  if (env.GOOGLE_CLIENT_SECRET_PATH) google.clientSecretPath = env.GOOGLE_CLIENT_SECRET_PATH;
  if (env.GOOGLE_TOKEN_PATH) google.tokenPath = env.GOOGLE_TOKEN_PATH;
  const callbackPort = parsePort(env.GOOGLE_OAUTH_CALLBACK_PORT);
  if (callbackPort !== undefined) google.callbackPort = callbackPort;
  if (Object.keys(google).length > 0) {
    config.google = google;
  }

  if (env.LOG_LEVEL) {
    config.logLevel = env.LOG_LEVEL;
  }

  return config;
}

// =============================================================================
// Main Config Loading
// =============================================================================

/**
 * Deep merge utility for combining config objects; source wins
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

export interface LoadConfigOptions {
  /** Environment to read from (defaults to process.env) */
  env?: Env;
  /** Explicit config file candidates (defaults to getConfigPaths()) */
  configPaths?: string[];
}

let cachedConfig: AppConfig | null = null;

/**
 * Load and validate the application configuration, then apply its log level.
 * The first successful load is cached until clearConfigCache() is called.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const fileConfig = loadConfigFile(options.configPaths ?? getConfigPaths(), env);
  const envConfig = buildConfigFromEnv(env);
  const merged = deepMerge(envConfig, fileConfig ?? {});

  const result = AppConfigSchema.safeParse(merged);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${details}`);
  }

  cachedConfig = result.data;
  setLogLevel(cachedConfig.logLevel);
  return cachedConfig;
}

/**
 * Get the current configuration, loading it on first use
 */
export function getConfig(): AppConfig {
  return cachedConfig ?? loadConfig();
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
