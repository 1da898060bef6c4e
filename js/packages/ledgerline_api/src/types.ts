/**
 * Type definitions and network defaults for the Ledgerline API client
 */

import { VERSION } from '@ledgerline/utils';
import { ConfigError } from './errors';

export type NetworkType = 'mainnet' | 'preprod' | 'preview' | 'testnet' | 'ipfs';

export const NETWORKS: readonly NetworkType[] = ['mainnet', 'preprod', 'preview', 'testnet', 'ipfs'];

export const CARDANO_MAINNET = 'https://cardano-mainnet.blockfrost.io/api/v0';
export const CARDANO_PREPROD = 'https://cardano-preprod.blockfrost.io/api/v0';
export const CARDANO_PREVIEW = 'https://cardano-preview.blockfrost.io/api/v0';
export const CARDANO_TESTNET = 'https://cardano-testnet.blockfrost.io/api/v0';
export const IPFS = 'https://ipfs.blockfrost.io/api/v0';

/**
 * Sent on every request
 */
export const USER_AGENT = `ledgerline/${VERSION}`;

/**
 * Error statuses the API documents. Anything else is still classified, but reported
 * as unexpected.
 */
export const DEFAULT_EXPECTED_STATUS_CODES: readonly number[] = [400, 403, 404, 418, 429, 500];

export type SortOrder = 'asc' | 'desc';

/**
 * Page selection for paged endpoints. Omitted fields fall back to the server defaults.
 */
export interface Pagination {
  /** 1-based page number */
  page?: number;
  /** Items per page (server allows 1..100) */
  count?: number;
  order?: SortOrder;
}

export interface Settings {
  /** Project id sent in the `project_id` header */
  projectId: string;
  /** Network to connect to (default: mainnet) */
  network?: NetworkType;
  /** Custom base URL (optional, overrides network default) */
  baseUrl?: string;
  /** Per-request timeout in milliseconds, none by default */
  timeout?: number;
  /** Error statuses that are not reported as unexpected */
  expectedStatusCodes?: readonly number[];
  /** Overrides {@link USER_AGENT} */
  userAgent?: string;
}

export function isNetworkType(value: string): value is NetworkType {
  return NETWORKS.some((network) => network === value);
}

/**
 * Get the API base URL for a given network
 */
export function getApiBaseUrl(network: NetworkType): string {
  switch (network) {
    case 'mainnet':
      return CARDANO_MAINNET;
    case 'preprod':
      return CARDANO_PREPROD;
    case 'preview':
      return CARDANO_PREVIEW;
    case 'testnet':
      return CARDANO_TESTNET;
    case 'ipfs':
      return IPFS;
    default:
      throw new ConfigError(`Invalid network: ${String(network)}`);
  }
}

/**
 * Base URL the settings point at, without a trailing slash
 */
export function resolveBaseUrl(settings: Settings): string {
  const baseUrl = settings.baseUrl || getApiBaseUrl(settings.network ?? 'mainnet');
  return baseUrl.replace(/\/+$/, '');
}
