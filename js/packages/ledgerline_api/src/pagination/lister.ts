import { createLogger } from '@ledgerline/utils';
import { ConcurrentAdvanceError, LedgerlineError } from '../errors';
import type { Pagination, SortOrder } from '../types';

const listerLogger = createLogger('ledgerline:api:lister');

/**
 * Fetches one page. A rejection ends the Lister; with the dispatcher as fetcher it is
 * a TransportError, DecodeError or ApiError.
 */
export type PageFetcher<T> = (pagination: Pagination) => Promise<T[]>;

export interface ListerOptions {
  /** First page to fetch (default: 1) */
  startPage?: number;
  /** Page size sent as `count`; server default when omitted */
  count?: number;
  order?: SortOrder;
}

export type ListerState =
  | { readonly status: 'ready'; readonly page: number }
  | { readonly status: 'fetching'; readonly page: number }
  | { readonly status: 'exhausted' }
  | { readonly status: 'failed'; readonly error: Error };

/**
 * Result of one {@link Lister.advance} call
 */
export type ListerStep<T> =
  | { kind: 'page'; page: number; items: T[] }
  | { kind: 'end' }
  | { kind: 'error'; error: Error };

function asError(error: unknown): Error {
  return error instanceof Error ? error : new LedgerlineError(String(error), error);
}

/**
 * Lazy page-by-page sequence over a paged endpoint.
 *
 * Each {@link advance} fetches exactly one page. An empty page ends the sequence
 * cleanly; the first error is returned once and ends it too. After that, `advance`
 * keeps returning `end` and never touches the network. There is no in-place reset:
 * {@link restart} builds a new Lister.
 *
 * @example
 * ```typescript
 * const lister = client.blocksPreviousAll('4874756', { count: 10 });
 * for (let step = await lister.advance(); step.kind === 'page'; step = await lister.advance()) {
 *   console.log(step.page, step.items.length);
 * }
 * ```
 */
export class Lister<T> implements AsyncIterable<T[]> {
  private state: ListerState;
  private readonly startPage: number;
  private readonly count: number | undefined;
  private readonly order: SortOrder | undefined;

  constructor(
    private readonly fetchPage: PageFetcher<T>,
    options: ListerOptions = {}
  ) {
    const startPage = options.startPage ?? 1;
    if (!Number.isInteger(startPage) || startPage < 1) {
      throw new RangeError(`startPage must be a positive integer, got ${startPage}`);
    }
    this.startPage = startPage;
    this.count = options.count;
    this.order = options.order;
    this.state = { status: 'ready', page: startPage };
  }

  get current(): ListerState {
    return { ...this.state };
  }

  get pageSize(): number | undefined {
    return this.count;
  }

  /**
   * True once the sequence has ended, cleanly or with an error
   */
  get done(): boolean {
    return this.state.status === 'exhausted' || this.state.status === 'failed';
  }

  /**
   * Fetch the next page.
   *
   * @throws ConcurrentAdvanceError when the previous advance has not settled yet
   */
  async advance(): Promise<ListerStep<T>> {
    const state = this.state;
    if (state.status === 'exhausted' || state.status === 'failed') {
      return { kind: 'end' };
    }
    if (state.status === 'fetching') {
      throw new ConcurrentAdvanceError(state.page);
    }

    const page = state.page;
    this.state = { status: 'fetching', page };

    let items: T[];
    try {
      items = await this.fetchPage({ page, count: this.count, order: this.order });
    } catch (caught) {
      const error = asError(caught);
      listerLogger.debug('Page failed, sequence ends', { page, error: error.name });
      this.state = { status: 'failed', error };
      return { kind: 'error', error };
    }

    if (items.length === 0) {
      listerLogger.debug('Empty page, sequence ends', { page });
      this.state = { status: 'exhausted' };
      return { kind: 'end' };
    }

    listerLogger.debug('Page fetched', { page, items: items.length });
    this.state = { status: 'ready', page: page + 1 };
    return { kind: 'page', page, items };
  }

  /**
   * Pages in order. The terminal error, if any, is thrown after the last page.
   * Breaking out of the loop stops fetching.
   */
  async *pages(): AsyncGenerator<T[], void, undefined> {
    for (;;) {
      const step = await this.advance();
      if (step.kind === 'end') return;
      if (step.kind === 'error') throw step.error;
      yield step.items;
    }
  }

  /**
   * Items one at a time; holds at most one page in memory.
   */
  async *items(): AsyncGenerator<T, void, undefined> {
    for await (const page of this.pages()) {
      yield* page;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T[]> {
    return this.pages();
  }

  /**
   * Fetch up to `limit` pages and return them. Stops early on an empty page;
   * rejects with the terminal error if one occurs.
   */
  async take(limit: number): Promise<T[][]> {
    const collected: T[][] = [];
    if (limit <= 0) return collected;

    for await (const page of this.pages()) {
      collected.push(page);
      if (collected.length >= limit) break;
    }
    return collected;
  }

  /**
   * Drain the whole sequence into one array
   */
  async collect(): Promise<T[]> {
    const all: T[] = [];
    for await (const page of this.pages()) {
      all.push(...page);
    }
    return all;
  }

  /**
   * A fresh Lister with the same fetcher and options, back at the start page
   */
  restart(): Lister<T> {
    return new Lister(this.fetchPage, {
      startPage: this.startPage,
      count: this.count,
      order: this.order,
    });
  }
}
