export { TypedEventEmitter, type EventMap } from './event-emitter';
export { formatJson } from './json';
