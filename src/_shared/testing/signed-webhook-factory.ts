import {
  IncomingWebhookRequest,
  RequestBodyError,
  RequestHeaders,
  SignatureVerifier,
  SIGNATURE_HEADER,
  EVENT_TYPE_HEADER,
  DELIVERY_ID_HEADER,
  CONTENT_TYPE_HEADER,
} from '../../core';

/**
 * Options for building a signed webhook.
 * `null` leaves the corresponding header out.
 */
export interface WebhookOptions {
  secret?: string;
  eventType?: string | null;
  deliveryId?: string | null;
  contentType?: string | null;
  signature?: string | null;
}

export interface SignedWebhook {
  body: Buffer;
  headers: Record<string, string>;
  signature: string;
}

/**
 * In-memory request that records how often its body was read
 */
export class InMemoryWebhookRequest implements IncomingWebhookRequest {
  readCount = 0;
  readonly method: string;
  readonly headers: RequestHeaders;
  readonly contentLength?: number;

  constructor(
    private readonly body: Buffer,
    headers: Record<string, string>,
    options: { method?: string; contentLength?: number | null } = {},
  ) {
    this.method = options.method ?? 'POST';
    this.headers = Object.fromEntries(
      Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]),
    );
    this.contentLength =
      options.contentLength === null ? undefined : options.contentLength ?? body.length;
  }

  async readBody(limit: number): Promise<Buffer> {
    this.readCount++;
    if (this.body.length > limit) {
      throw new RequestBodyError('Request body exceeds limit', 'too_large');
    }
    return this.body;
  }
}

/**
 * Factory for signed webhook requests used in tests
 */
export class SignedWebhookFactory {
  private static verifier = new SignatureVerifier();

  /**
   * Sign a payload the way the CI provider does
   */
  static create(
    payload: Record<string, unknown> | string | Buffer,
    options: WebhookOptions = {},
  ): SignedWebhook {
    const secret = options.secret ?? 'test-secret';
    const body = Buffer.isBuffer(payload)
      ? payload
      : Buffer.from(typeof payload === 'string' ? payload : JSON.stringify(payload));

    const signature =
      options.signature === undefined || options.signature === null
        ? this.verifier.sign(body, secret)
        : options.signature;

    const headers: Record<string, string> = {};
    if (options.signature !== null) {
      headers[SIGNATURE_HEADER] = signature;
    }
    if (options.eventType !== null) {
      headers[EVENT_TYPE_HEADER] = options.eventType ?? 'push';
    }
    if (options.deliveryId !== null) {
      headers[DELIVERY_ID_HEADER] = options.deliveryId ?? 'delivery-1';
    }
    if (options.contentType !== null) {
      headers[CONTENT_TYPE_HEADER] = options.contentType ?? 'application/json';
    }

    return { body, headers, signature };
  }

  /**
   * Build a signed in-memory request
   */
  static request(
    payload: Record<string, unknown> | string | Buffer,
    options: WebhookOptions & { contentLength?: number | null } = {},
  ): InMemoryWebhookRequest {
    const { body, headers } = this.create(payload, options);
    return new InMemoryWebhookRequest(body, headers, {
      contentLength: options.contentLength,
    });
  }
}
