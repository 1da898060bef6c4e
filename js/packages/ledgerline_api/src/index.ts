/**
 * Ledgerline REST API client
 *
 * A typed client for the Cardano blockchain-data REST API: a single-request
 * dispatcher, an error classifier and a lazy page-by-page Lister.
 *
 * @see https://docs.blockfrost.io
 */

export * from './api-client';
export * from './client';
export * from './config';
export * from './decoding';
export * from './endpoints';
export * from './errors';
export * from './pagination';
export * from './transport';
export * from './types';
export { formatJson, TypedEventEmitter, type EventMap } from './utils';
