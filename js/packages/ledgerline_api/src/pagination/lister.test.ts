import { ApiError, ConcurrentAdvanceError, DecodeError, LedgerlineError, TransportError } from '../errors';
import type { Pagination } from '../types';
import { Lister } from './lister';

/**
 * Fetcher serving fixed pages (1-based); pages past the end are empty
 */
function pagedSource<T>(pages: T[][]) {
  return jest.fn(async (pagination: Pagination): Promise<T[]> => pages[(pagination.page ?? 1) - 1] ?? []);
}

function apiError(status: number): ApiError {
  return new ApiError('https://api.test/v0/items', {
    status_code: status,
    error: 'Internal Server Error',
    message: 'boom',
  });
}

describe('Lister', () => {
  describe('advance', () => {
    it('yields every non-empty page in order, then ends', async () => {
      const fetchPage = pagedSource([['a', 'b'], ['c'], ['d', 'e']]);
      const lister = new Lister(fetchPage);

      expect(await lister.advance()).toEqual({ kind: 'page', page: 1, items: ['a', 'b'] });
      expect(await lister.advance()).toEqual({ kind: 'page', page: 2, items: ['c'] });
      expect(await lister.advance()).toEqual({ kind: 'page', page: 3, items: ['d', 'e'] });
      expect(await lister.advance()).toEqual({ kind: 'end' });

      expect(fetchPage.mock.calls.map(([pagination]) => pagination.page)).toEqual([1, 2, 3, 4]);
      expect(lister.current).toEqual({ status: 'exhausted' });
      expect(lister.done).toBe(true);
    });

    it('starts at the configured page', async () => {
      const fetchPage = pagedSource([['a'], ['b'], ['c']]);
      const lister = new Lister(fetchPage, { startPage: 2 });

      expect(await lister.advance()).toEqual({ kind: 'page', page: 2, items: ['b'] });
      expect(await lister.advance()).toEqual({ kind: 'page', page: 3, items: ['c'] });
      expect(await lister.advance()).toEqual({ kind: 'end' });
    });

    it('forwards page size and order on every request', async () => {
      const fetchPage = pagedSource([[1, 2]]);
      const lister = new Lister(fetchPage, { count: 2, order: 'desc' });

      await lister.advance();
      await lister.advance();

      expect(fetchPage.mock.calls).toEqual([
        [{ page: 1, count: 2, order: 'desc' }],
        [{ page: 2, count: 2, order: 'desc' }],
      ]);
      expect(lister.pageSize).toBe(2);
    });

    it('keeps the page size it was built with', async () => {
      const fetchPage = pagedSource([[1, 2], [3, 4]]);
      const options = { count: 2 };
      const lister = new Lister(fetchPage, options);

      await lister.advance();
      options.count = 100;
      await lister.advance();

      expect(fetchPage.mock.calls.map(([pagination]) => pagination.count)).toEqual([2, 2]);
      expect(lister.pageSize).toBe(2);
      expect(lister.restart().pageSize).toBe(2);
    });

    it('does not let a read state move the cursor', async () => {
      const fetchPage = pagedSource([['a'], ['b'], ['c']]);
      const lister = new Lister(fetchPage);

      await lister.advance();
      Object.assign(lister.current, { page: 7 });
      await lister.advance();

      expect(fetchPage.mock.calls.map(([pagination]) => pagination.page)).toEqual([1, 2]);
      expect(lister.current).toEqual({ status: 'ready', page: 3 });
    });

    it('makes no request once exhausted', async () => {
      const fetchPage = pagedSource<string>([]);
      const lister = new Lister(fetchPage);

      expect(await lister.advance()).toEqual({ kind: 'end' });
      expect(await lister.advance()).toEqual({ kind: 'end' });
      expect(await lister.advance()).toEqual({ kind: 'end' });

      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it.each([
      ['ApiError', apiError(500)],
      ['TransportError', new TransportError('https://api.test/v0/items', new Error('ECONNRESET'))],
      ['DecodeError', new DecodeError('https://api.test/v0/items', '[', new SyntaxError('bad'))],
    ])('ends with a %s delivered exactly once', async (_name, failure) => {
      const fetchPage = jest.fn(async (pagination: Pagination): Promise<string[]> => {
        if (pagination.page === 3) throw failure;
        return [`item-${pagination.page}`];
      });
      const lister = new Lister(fetchPage);

      expect(await lister.advance()).toEqual({ kind: 'page', page: 1, items: ['item-1'] });
      expect(await lister.advance()).toEqual({ kind: 'page', page: 2, items: ['item-2'] });
      expect(await lister.advance()).toEqual({ kind: 'error', error: failure });
      expect(await lister.advance()).toEqual({ kind: 'end' });

      expect(fetchPage).toHaveBeenCalledTimes(3);
      expect(lister.current).toEqual({ status: 'failed', error: failure });
    });

    it('wraps a non-Error rejection', async () => {
      const lister = new Lister<string>(() => Promise.reject('plain string'));

      const step = await lister.advance();

      expect(step.kind).toBe('error');
      if (step.kind !== 'error') return;
      expect(step.error).toBeInstanceOf(LedgerlineError);
      expect(step.error.message).toBe('plain string');
    });

    it('rejects an overlapping advance without moving the cursor', async () => {
      let release: (items: string[]) => void = () => undefined;
      const fetchPage = jest.fn(
        () =>
          new Promise<string[]>((resolve) => {
            release = resolve;
          })
      );
      const lister = new Lister(fetchPage);

      const first = lister.advance();
      expect(lister.current).toEqual({ status: 'fetching', page: 1 });
      await expect(lister.advance()).rejects.toBeInstanceOf(ConcurrentAdvanceError);

      release(['a']);

      expect(await first).toEqual({ kind: 'page', page: 1, items: ['a'] });
      expect(lister.current).toEqual({ status: 'ready', page: 2 });
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it('rejects a start page below 1', () => {
      expect(() => new Lister(pagedSource([]), { startPage: 0 })).toThrow(RangeError);
    });
  });

  describe('iteration', () => {
    it('stops fetching when the consumer breaks out', async () => {
      const fetchPage = jest.fn(async (pagination: Pagination) => [pagination.page]);
      const lister = new Lister(fetchPage);

      const seen: (number | undefined)[][] = [];
      for await (const page of lister) {
        seen.push(page);
        if (seen.length === 3) break;
      }

      expect(seen).toEqual([[1], [2], [3]]);
      expect(fetchPage).toHaveBeenCalledTimes(3);
    });

    it('take(M) issues exactly M requests', async () => {
      const fetchPage = jest.fn(async (pagination: Pagination) => [pagination.page]);

      const pages = await new Lister(fetchPage).take(2);

      expect(pages).toEqual([[1], [2]]);
      expect(fetchPage).toHaveBeenCalledTimes(2);
    });

    it('take stops at the end of the data', async () => {
      const fetchPage = pagedSource([['a']]);

      expect(await new Lister(fetchPage).take(5)).toEqual([['a']]);
      expect(fetchPage).toHaveBeenCalledTimes(2);
    });

    it('throws the terminal error after the good pages', async () => {
      const failure = apiError(500);
      const fetchPage = jest.fn(async (pagination: Pagination): Promise<string[]> => {
        if (pagination.page === 2) throw failure;
        return ['first'];
      });
      const lister = new Lister(fetchPage);

      const seen: string[][] = [];
      await expect(
        (async () => {
          for await (const page of lister.pages()) seen.push(page);
        })()
      ).rejects.toBe(failure);

      expect(seen).toEqual([['first']]);
      expect(await lister.advance()).toEqual({ kind: 'end' });
      expect(fetchPage).toHaveBeenCalledTimes(2);
    });

    it('flattens pages into items', async () => {
      const lister = new Lister(pagedSource([['a', 'b'], ['c']]));

      const items: string[] = [];
      for await (const item of lister.items()) items.push(item);

      expect(items).toEqual(['a', 'b', 'c']);
    });

    it('collect drains the sequence', async () => {
      expect(await new Lister(pagedSource([[1, 2], [3], [4]])).collect()).toEqual([1, 2, 3, 4]);
    });
  });

  describe('restart', () => {
    it('builds a fresh Lister at the start page', async () => {
      const fetchPage = pagedSource([['a'], ['b']]);
      const lister = new Lister(fetchPage, { startPage: 2, count: 1 });
      await lister.collect();

      const again = lister.restart();

      expect(again).not.toBe(lister);
      expect(again.current).toEqual({ status: 'ready', page: 2 });
      expect(await again.advance()).toEqual({ kind: 'page', page: 2, items: ['b'] });
      expect(lister.current).toEqual({ status: 'exhausted' });
    });
  });
});
