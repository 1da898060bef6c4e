export {
  paginationQuery,
  RequestDispatcher,
  type DispatcherConfig,
  type PathParams,
  type QueryParams,
  type RequestOptions,
} from './request-dispatcher';
export {
  decodeErrorEnvelope,
  ResponseClassifier,
  UNPARSEABLE_ERROR_BODY,
  type ClassifierEvents,
  type UnexpectedStatusEvent,
} from './response-classifier';
