import { createLogger } from '@ledgerline/utils';
import { type Decoder, field, int, record, SchemaError, str } from '../decoding/decoders';
import { ApiError, type ErrorEnvelope } from '../errors';
import { DEFAULT_EXPECTED_STATUS_CODES } from '../types';
import { formatJson, TypedEventEmitter } from '../utils';

const classifierLogger = createLogger('ledgerline:api:classifier');

export const UNPARSEABLE_ERROR_BODY =
  'Could not parse error body to interpret the reason of the error';

export interface UnexpectedStatusEvent {
  status: number;
  url: string;
}

export type ClassifierEvents = {
  unexpectedStatus: [UnexpectedStatusEvent];
};

const MAX_STATUS_CODE = 0xffff;

const statusCode: Decoder<number> = (value, path) => {
  const code = int(value, path);
  if (code < 0 || code > MAX_STATUS_CODE) {
    throw new SchemaError(path ?? '$', 'status code in 0..65535', value);
  }
  return code;
};

export function decodeErrorEnvelope(value: unknown): ErrorEnvelope {
  const source = record(value);
  return {
    status_code: field(source, 'status_code', statusCode),
    error: field(source, 'error', str),
    message: field(source, 'message', str),
  };
}

/**
 * Turns a non-2xx response into an {@link ApiError}. Never throws.
 *
 * A body that is not the API's error envelope is kept in `message`, pretty-printed
 * when it is JSON of some other shape, verbatim otherwise.
 */
export class ResponseClassifier extends TypedEventEmitter<ClassifierEvents> {
  private readonly expectedStatusCodes: ReadonlySet<number>;

  constructor(expectedStatusCodes: readonly number[] = DEFAULT_EXPECTED_STATUS_CODES) {
    super();
    this.expectedStatusCodes = new Set(expectedStatusCodes);
  }

  classify(status: number, body: string, url: string): ApiError {
    if (!this.expectedStatusCodes.has(status)) {
      classifierLogger.warn(`Status code ${status} was not expected`, { url });
      this.emit('unexpectedStatus', { status, url });
    }

    const envelope = this.parseEnvelope(body);
    if (envelope) {
      return new ApiError(url, envelope);
    }

    return new ApiError(url, {
      status_code: status,
      error: UNPARSEABLE_ERROR_BODY,
      message: formatJson(body) ?? body,
    });
  }

  private parseEnvelope(body: string): ErrorEnvelope | undefined {
    try {
      return decodeErrorEnvelope(JSON.parse(body));
    } catch (error) {
      classifierLogger.debug('Error body is not an error envelope', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
