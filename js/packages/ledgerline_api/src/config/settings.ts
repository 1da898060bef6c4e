import { readFile } from 'node:fs/promises';
import { createLogger } from '@ledgerline/utils';
import { field, int, nullable, record, str } from '../decoding/decoders';
import { ConfigError, LocalIoError } from '../errors';
import { isNetworkType, type NetworkType, type Settings } from '../types';

const configLogger = createLogger('ledgerline:api:config');

export const PROJECT_ID_ENV = 'BLOCKFROST_PROJECT_ID';
export const NETWORK_ENV = 'BLOCKFROST_NETWORK';
export const BASE_URL_ENV = 'BLOCKFROST_BASE_URL';
export const TIMEOUT_ENV = 'BLOCKFROST_TIMEOUT_MS';

type Env = Record<string, string | undefined>;

/**
 * Project id from `BLOCKFROST_PROJECT_ID`, or undefined when unset or blank
 */
export function loadProjectId(env: Env = process.env): string | undefined {
  const projectId = env[PROJECT_ID_ENV]?.trim();
  return projectId ? projectId : undefined;
}

function parseNetwork(value: string, path?: string): NetworkType {
  if (!isNetworkType(value)) {
    throw new ConfigError(`unknown network '${value}'`, path);
  }
  return value;
}

function parseTimeout(value: number, path?: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`timeout must be a positive integer of milliseconds, got ${value}`, path);
  }
  return value;
}

/**
 * Settings from `BLOCKFROST_*` environment variables
 *
 * @throws ConfigError when the project id is missing or a value is invalid
 */
export function loadSettingsFromEnv(env: Env = process.env): Settings {
  const projectId = loadProjectId(env);
  if (!projectId) {
    throw new ConfigError(`${PROJECT_ID_ENV} is not set`);
  }

  const settings: Settings = { projectId };

  const network = env[NETWORK_ENV]?.trim();
  if (network) settings.network = parseNetwork(network);

  const baseUrl = env[BASE_URL_ENV]?.trim();
  if (baseUrl) settings.baseUrl = baseUrl;

  const timeout = env[TIMEOUT_ENV]?.trim();
  if (timeout) settings.timeout = parseTimeout(Number(timeout));

  return settings;
}

/**
 * Settings from a JSON file:
 *
 * ```json
 * { "project_id": "mainnet...", "network": "mainnet", "base_url": null, "timeout_ms": 30000 }
 * ```
 *
 * Only `project_id` is required.
 *
 * @throws LocalIoError when the file cannot be read
 * @throws ConfigError when the file is not valid JSON or has invalid values
 */
export async function loadSettingsFile(path: string): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new LocalIoError(path, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError('file is not valid JSON', path, error);
  }

  try {
    const source = record(parsed);
    const projectId = field(source, 'project_id', str).trim();
    if (!projectId) {
      throw new ConfigError('project_id is empty', path);
    }

    const settings: Settings = { projectId };

    const network = field(source, 'network', nullable(str));
    if (network !== null) settings.network = parseNetwork(network, path);

    const baseUrl = field(source, 'base_url', nullable(str));
    if (baseUrl !== null) settings.baseUrl = baseUrl;

    const timeout = field(source, 'timeout_ms', nullable(int));
    if (timeout !== null) settings.timeout = parseTimeout(timeout, path);

    configLogger.debug('Settings loaded', { path, network: settings.network ?? 'mainnet' });
    return settings;
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(error instanceof Error ? error.message : String(error), path, error);
  }
}
