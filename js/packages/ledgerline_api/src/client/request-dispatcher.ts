import { createFinalURL, createQuerySerializer } from 'openapi-fetch';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '@ledgerline/utils';
import { array, type Decoder } from '../decoding/decoders';
import { DecodeError } from '../errors';
import type { Transport } from '../transport';
import type { Pagination } from '../types';
import { ResponseClassifier } from './response-classifier';

const dispatcherLogger = createLogger('ledgerline:api:dispatcher');

export type PathParams = Record<string, string | number>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  /** Values for `{name}` segments of the path */
  params?: PathParams;
  query?: QueryParams;
}

export interface DispatcherConfig {
  baseUrl: string;
  projectId: string;
  userAgent: string;
}

const serializeQuery = createQuerySerializer();

/**
 * Query parameters for a page request; unset fields are left out so the server
 * applies its defaults.
 */
export function paginationQuery(pagination?: Pagination): QueryParams {
  return {
    page: pagination?.page,
    count: pagination?.count,
    order: pagination?.order,
  };
}

/**
 * Single-request path: URL building, one transport call, classification, decoding.
 *
 * No retries happen here; every failure reaches the caller as
 * TransportError, DecodeError or ApiError.
 */
export class RequestDispatcher {
  constructor(
    private readonly config: DispatcherConfig,
    private readonly transport: Transport,
    private readonly classifier: ResponseClassifier = new ResponseClassifier()
  ) {}

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get responseClassifier(): ResponseClassifier {
    return this.classifier;
  }

  /**
   * `{baseUrl}{path}` with path params filled in and `?query` only when a query value is set
   */
  buildUrl(path: string, options: RequestOptions = {}): string {
    return createFinalURL(path, {
      baseUrl: this.config.baseUrl,
      params: { path: options.params, query: options.query },
      querySerializer: serializeQuery,
    });
  }

  /**
   * Fetch and decode a single JSON value
   */
  async call<T>(path: string, decode: Decoder<T>, options?: RequestOptions): Promise<T> {
    const url = this.buildUrl(path, options);
    const requestId = uuidv4();
    const startedAt = Date.now();

    dispatcherLogger.debug('GET', { requestId, url });

    const response = await this.transport.get(url, {
      project_id: this.config.projectId,
      'User-Agent': this.config.userAgent,
      Accept: 'application/json',
    });

    dispatcherLogger.debug('Response received', {
      requestId,
      status: response.status,
      elapsedMs: Date.now() - startedAt,
    });

    if (response.status < 200 || response.status >= 300) {
      throw this.classifier.classify(response.status, response.text, url);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.text);
    } catch (error) {
      throw new DecodeError(url, response.text, error);
    }

    try {
      return decode(parsed);
    } catch (error) {
      throw new DecodeError(url, response.text, error);
    }
  }

  /**
   * Fetch and decode one page of a paged endpoint
   */
  async callPaged<T>(
    path: string,
    decodeItem: Decoder<T>,
    pagination?: Pagination,
    params?: PathParams
  ): Promise<T[]> {
    return this.call(path, array(decodeItem), { params, query: paginationQuery(pagination) });
  }
}
