export { FetchTransport, type FetchTransportOptions, type RawResponse, type Transport } from './transport';
