import { IncomingMessage } from 'http';
import { RawBodyRequest } from '@nestjs/common';
import getRawBody from 'raw-body';
import {
  IncomingWebhookRequest,
  RequestBodyError,
} from '../../core';

const CONTENT_LENGTH_PATTERN = /^\d+$/;

/**
 * Declared Content-Length, or undefined when missing or unparseable
 */
export function parseContentLength(value: string | undefined): number | undefined {
  if (value === undefined || !CONTENT_LENGTH_PATTERN.test(value)) {
    return undefined;
  }
  return Number(value);
}

/**
 * The host application parsed the body before the pipeline could read it
 */
export class BodyAlreadyConsumedError extends Error {
  constructor() {
    super(
      'Request body was consumed before the webhook pipeline read it; ' +
        'create the application with { bodyParser: false } (or { rawBody: true })',
    );
    this.name = 'BodyAlreadyConsumedError';
  }
}

/**
 * Wrap a Node request as an IncomingWebhookRequest
 *
 * The body stays on the socket until `readBody` is called. Reading stops as
 * soon as `limit` is exceeded, whatever Content-Length claimed. When Nest
 * already buffered the body (`rawBody: true`) that buffer is used instead,
 * under the same limit.
 */
export function fromIncomingMessage(
  req: RawBodyRequest<IncomingMessage>,
): IncomingWebhookRequest {
  const contentLength = parseContentLength(req.headers['content-length']);

  return {
    method: req.method ?? 'GET',
    headers: req.headers,
    contentLength,
    readBody: async (limit: number): Promise<Buffer> => {
      if (Buffer.isBuffer(req.rawBody)) {
        if (req.rawBody.length > limit) {
          throw new RequestBodyError('Request body exceeds limit', 'too_large');
        }
        return req.rawBody;
      }

      if (!req.readable) {
        throw new BodyAlreadyConsumedError();
      }

      try {
        return await getRawBody(req, { length: contentLength, limit });
      } catch (error) {
        throw toRequestBodyError(error);
      }
    },
  };
}

/**
 * Map raw-body's client-side failures; anything else is rethrown as is
 */
function toRequestBodyError(error: unknown): unknown {
  if (!(error instanceof Error) || !('type' in error)) {
    return error;
  }

  switch (error.type) {
    case 'entity.too.large':
      return new RequestBodyError('Request body exceeds limit', 'too_large', error);
    case 'request.size.invalid':
      return new RequestBodyError('Request body does not match Content-Length', 'length_mismatch', error);
    case 'request.aborted':
      return new RequestBodyError('Request aborted by client', 'aborted', error);
    case 'stream.not.readable':
      return new BodyAlreadyConsumedError();
    default:
      return error;
  }
}
