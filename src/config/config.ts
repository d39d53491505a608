import fs from 'fs';
import path from 'path';
import envPaths from 'env-paths';
import { logger } from '../lib/logger';
import { DEBUG_ENV_VAR } from './constants';

export interface ConfigShape {
  token?: string;
  apiBase?: string;
}

const paths = envPaths('stance-github');
const configDir = paths.config;
const configFile = path.join(configDir, 'config.json');

function pickString(source: Record<string, unknown>, key: keyof ConfigShape): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Gets the absolute path to the configuration file
 *
 * @returns Absolute path to config.json in the user's config directory
 */
export function getConfigPath() {
  return configFile;
}

/**
 * Reads the configuration file from disk
 *
 * Parses config.json from the user's config directory. Returns empty object
 * if the file doesn't exist or parsing fails; unknown keys and values of the
 * wrong type are dropped.
 *
 * @returns Configuration object containing the stored token and API base
 * @example
 * ```typescript
 * const config = readConfig();
 * if (config.apiBase) {
 *   console.log(`Talking to ${config.apiBase}`);
 * }
 * ```
 */
export function readConfig(): ConfigShape {
  try {
    const data = fs.readFileSync(configFile, 'utf8');
    const json: unknown = JSON.parse(data);
    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
      return {};
    }
    const record: Record<string, unknown> = { ...json };
    const cfg: ConfigShape = {};
    const token = pickString(record, 'token');
    const apiBase = pickString(record, 'apiBase');
    if (token !== undefined) cfg.token = token;
    if (apiBase !== undefined) cfg.apiBase = apiBase;
    return cfg;
  } catch (error) {
    logger.debug('Failed to read config file', { error });
    return {};
  }
}

/**
 * Writes configuration to disk
 *
 * Creates config directory if needed, writes JSON with formatting, and sets
 * restrictive file permissions (0600) on POSIX systems.
 *
 * @param cfg - Configuration object to write
 */
export function writeConfig(cfg: ConfigShape) {
  fs.mkdirSync(configDir, { recursive: true });
  const body = JSON.stringify(cfg, null, 2);
  fs.writeFileSync(configFile, body, 'utf8');
  // Tighten permissions on POSIX
  if (process.platform !== 'win32') {
    try {
      fs.chmodSync(configFile, 0o600);
    } catch (error) {
      logger.debug('Failed to set permissions on config file', { error });
    }
  }
}

/**
 * Retrieves GitHub token from environment variables
 *
 * Checks both GITHUB_TOKEN and GH_TOKEN environment variables.
 *
 * @returns Token string if found in environment, undefined otherwise
 */
export function getTokenFromEnv(): string | undefined {
  return process.env.GITHUB_TOKEN || process.env.GH_TOKEN;
}

/**
 * Whether request/response tracing was switched on in the environment
 *
 * Read once by the caller at startup and handed to the client; the client
 * itself never looks at the environment.
 */
export function isDebugFromEnv(): boolean {
  return process.env[DEBUG_ENV_VAR] === 'on';
}

export function getStoredToken(): string | undefined {
  return readConfig().token;
}

/**
 * Stores GitHub token in config file, preserving the other settings
 *
 * @param token - GitHub personal access token
 * @example
 * ```typescript
 * storeToken('test-token');
 * ```
 */
export function storeToken(token: string) {
  const existing = readConfig();
  writeConfig({ ...existing, token });
}

export function clearStoredToken() {
  const { token: _token, ...rest } = readConfig();
  writeConfig(rest);
}

/**
 * Resolves the token to authenticate with: environment first, then the
 * stored config
 */
export function resolveToken(): string | undefined {
  return getTokenFromEnv() || getStoredToken();
}
