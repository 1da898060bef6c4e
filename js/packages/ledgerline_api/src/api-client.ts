/**
 * Ledgerline API Client
 *
 * Typed client for the Cardano blockchain-data REST API
 */

import { createLogger } from '@ledgerline/utils';
import { type PathParams, RequestDispatcher } from './client/request-dispatcher';
import { ResponseClassifier } from './client/response-classifier';
import { str, type Decoder } from './decoding/decoders';
import {
  type AffectedAddress,
  type ApiRoot,
  type Block,
  BLOCK_PATHS,
  decodeAffectedAddress,
  decodeApiRoot,
  decodeBlock,
  decodeHealthClock,
  decodeHealthStatus,
  HEALTH_PATHS,
  type HealthClock,
  type HealthStatus,
} from './endpoints';
import { Lister, type ListerOptions } from './pagination';
import { FetchTransport, type Transport } from './transport';
import { type NetworkType, type Pagination, resolveBaseUrl, type Settings, USER_AGENT } from './types';

const clientLogger = createLogger('ledgerline:api:client');

/**
 * Create the dispatcher the client funnels every request through
 *
 * @example
 * ```typescript
 * const dispatcher = createDispatcher({ projectId: 'test-project', network: 'preview' });
 * const block = await dispatcher.call('/blocks/latest', decodeBlock);
 * ```
 */
export function createDispatcher(settings: Settings, transport?: Transport): RequestDispatcher {
  return new RequestDispatcher(
    {
      baseUrl: resolveBaseUrl(settings),
      projectId: settings.projectId,
      userAgent: settings.userAgent ?? USER_AGENT,
    },
    transport ?? new FetchTransport({ timeout: settings.timeout }),
    new ResponseClassifier(settings.expectedStatusCodes)
  );
}

/**
 * Client for the blocks and health endpoints.
 *
 * Methods returning a `Promise` make exactly one request. The `*All` methods return a
 * {@link Lister} that fetches pages on demand.
 */
export class ApiClient {
  public readonly network: NetworkType;
  public readonly baseUrl: string;
  /** Emits `unexpectedStatus` for error statuses outside `expectedStatusCodes` */
  public readonly classifier: ResponseClassifier;
  private readonly dispatcher: RequestDispatcher;

  constructor(settings: Settings, transport?: Transport) {
    this.network = settings.network ?? 'mainnet';
    this.dispatcher = createDispatcher(settings, transport);
    this.baseUrl = this.dispatcher.baseUrl;
    this.classifier = this.dispatcher.responseClassifier;

    clientLogger.debug('ApiClient initialized', { network: this.network, baseUrl: this.baseUrl });
  }

  /**
   * API root: documentation URL and backend version
   */
  async root(): Promise<ApiRoot> {
    return this.dispatcher.call(HEALTH_PATHS.root, decodeApiRoot);
  }

  async health(): Promise<HealthStatus> {
    return this.dispatcher.call(HEALTH_PATHS.health, decodeHealthStatus);
  }

  async healthClock(): Promise<HealthClock> {
    return this.dispatcher.call(HEALTH_PATHS.clock, decodeHealthClock);
  }

  async blocksLatest(): Promise<Block> {
    return this.dispatcher.call(BLOCK_PATHS.latest, decodeBlock);
  }

  /**
   * @param hashOrNumber - Block hash or block number
   */
  async blocksById(hashOrNumber: string): Promise<Block> {
    return this.dispatcher.call(BLOCK_PATHS.byId, decodeBlock, {
      params: { hash_or_number: hashOrNumber },
    });
  }

  async blocksSlot(slotNumber: number): Promise<Block> {
    return this.dispatcher.call(BLOCK_PATHS.bySlot, decodeBlock, {
      params: { slot_number: slotNumber },
    });
  }

  async blocksByEpochAndSlot(epochNumber: number, slotNumber: number): Promise<Block> {
    return this.dispatcher.call(BLOCK_PATHS.byEpochAndSlot, decodeBlock, {
      params: { epoch_number: epochNumber, slot_number: slotNumber },
    });
  }

  /**
   * Transaction hashes of the latest block
   */
  async blocksLatestTxs(pagination?: Pagination): Promise<string[]> {
    return this.dispatcher.callPaged(BLOCK_PATHS.latestTxs, str, pagination);
  }

  async blocksNext(hashOrNumber: string, pagination?: Pagination): Promise<Block[]> {
    return this.dispatcher.callPaged(BLOCK_PATHS.next, decodeBlock, pagination, {
      hash_or_number: hashOrNumber,
    });
  }

  async blocksPrevious(hashOrNumber: string, pagination?: Pagination): Promise<Block[]> {
    return this.dispatcher.callPaged(BLOCK_PATHS.previous, decodeBlock, pagination, {
      hash_or_number: hashOrNumber,
    });
  }

  async blocksTxs(hashOrNumber: string, pagination?: Pagination): Promise<string[]> {
    return this.dispatcher.callPaged(BLOCK_PATHS.txs, str, pagination, {
      hash_or_number: hashOrNumber,
    });
  }

  async blocksAffectedAddresses(
    hashOrNumber: string,
    pagination?: Pagination
  ): Promise<AffectedAddress[]> {
    return this.dispatcher.callPaged(BLOCK_PATHS.addresses, decodeAffectedAddress, pagination, {
      hash_or_number: hashOrNumber,
    });
  }

  blocksNextAll(hashOrNumber: string, options?: ListerOptions): Lister<Block> {
    return new Lister((pagination) => this.blocksNext(hashOrNumber, pagination), options);
  }

  blocksPreviousAll(hashOrNumber: string, options?: ListerOptions): Lister<Block> {
    return new Lister((pagination) => this.blocksPrevious(hashOrNumber, pagination), options);
  }

  blocksTxsAll(hashOrNumber: string, options?: ListerOptions): Lister<string> {
    return new Lister((pagination) => this.blocksTxs(hashOrNumber, pagination), options);
  }

  blocksAffectedAddressesAll(
    hashOrNumber: string,
    options?: ListerOptions
  ): Lister<AffectedAddress> {
    return new Lister(
      (pagination) => this.blocksAffectedAddresses(hashOrNumber, pagination),
      options
    );
  }

  /**
   * Escape hatch for endpoints without a dedicated method
   */
  get requests(): RequestDispatcher {
    return this.dispatcher;
  }
}

/**
 * Build a {@link Lister} over any paged path
 *
 * @example
 * ```typescript
 * const lister = listPages(dispatcher, '/epochs/{number}/blocks', str, { number: 225 }, { count: 100 });
 * ```
 */
export function listPages<T>(
  dispatcher: RequestDispatcher,
  path: string,
  decodeItem: Decoder<T>,
  params?: PathParams,
  options?: ListerOptions
): Lister<T> {
  return new Lister((pagination) => dispatcher.callPaged(path, decodeItem, pagination, params), options);
}
