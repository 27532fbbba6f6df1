/**
 * Lower-cased request headers as delivered by Node's HTTP parser
 */
export type RequestHeaders = Record<string, string | string[] | undefined>;

/**
 * A single inbound webhook request
 *
 * The body is not buffered up front: `readBody` pulls it from the
 * connection on demand, so a request rejected by the gate is never read.
 */
export interface IncomingWebhookRequest {
  method: string;
  headers: RequestHeaders;

  /**
   * Value of Content-Length, or undefined when the sender did not declare one
   */
  contentLength?: number;

  /**
   * Read the raw body, failing with RequestBodyError once `limit` bytes are exceeded
   */
  readBody(limit: number): Promise<Buffer>;
}

/**
 * Why the body of a request could not be read
 */
export type RequestBodyErrorReason = 'too_large' | 'length_mismatch' | 'aborted';

/**
 * Raised by `readBody` for problems caused by the client
 */
export class RequestBodyError extends Error {
  constructor(
    message: string,
    public readonly reason: RequestBodyErrorReason,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RequestBodyError';
  }
}

/**
 * First value of a header, or undefined when absent
 */
export function headerValue(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
