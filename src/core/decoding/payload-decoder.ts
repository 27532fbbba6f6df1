import * as iconv from 'iconv-lite';
import { WebhookPayload } from '../domain/models';

export type DecodeFailure = 'unsupported_charset' | 'invalid_json';

export type DecodeResult =
  | { ok: true; payload: WebhookPayload; charset: string }
  | { ok: false; error: DecodeFailure; charset: string };

const CHARSET_PATTERN = /charset=([^;,\s]+)/i;

/**
 * Charset declared in a Content-Type header, if any
 */
export function charsetFromContentType(contentType: string | undefined): string | undefined {
  const match = contentType?.match(CHARSET_PATTERN);
  return match ? match[1].trim().replace(/['"]/g, '') : undefined;
}

export function isJsonObject(value: unknown): value is WebhookPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes webhook bodies into JSON objects
 *
 * Text is decoded with the declared charset. Anything other than a single
 * JSON object (arrays, scalars, `null`, an empty body) is invalid.
 */
export class PayloadDecoder {
  constructor(private readonly defaultCharset = 'utf-8') {}

  decode(rawBody: Buffer, contentType?: string): DecodeResult {
    const charset = charsetFromContentType(contentType) ?? this.defaultCharset;
    if (!iconv.encodingExists(charset)) {
      return { ok: false, error: 'unsupported_charset', charset };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(iconv.decode(rawBody, charset));
    } catch (error) {
      if (error instanceof SyntaxError) {
        return { ok: false, error: 'invalid_json', charset };
      }
      throw error;
    }

    if (!isJsonObject(parsed)) {
      return { ok: false, error: 'invalid_json', charset };
    }

    return { ok: true, payload: parsed, charset };
  }
}
