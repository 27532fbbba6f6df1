import * as crypto from 'crypto';
import * as iconv from 'iconv-lite';
import { Logger } from '@nestjs/common';

export const SIGNATURE_256_PREFIX = 'sha256=';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Creates a keyed HMAC-SHA256 instance
 */
export type HmacFactory = (key: Buffer) => crypto.Hmac;

const defaultHmacFactory: HmacFactory = (key) =>
  crypto.createHmac('sha256', key);

/**
 * The HMAC primitive could not be created or failed while hashing.
 * This is an environment fault, never a verdict on the request.
 */
export class HmacUnavailableError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = 'HmacUnavailableError';
  }
}

/**
 * A text body was supplied with a charset iconv-lite does not know
 */
export class UnsupportedCharsetError extends Error {
  constructor(public readonly charset: string) {
    super(`Unsupported charset: ${charset}`);
    this.name = 'UnsupportedCharsetError';
  }
}

/**
 * Verifies `x-hub-signature-256` style signatures
 *
 * The header is `sha256=` followed by the hex HMAC-SHA256 of the raw body,
 * keyed with the shared webhook secret.
 */
export class SignatureVerifier {
  private readonly logger = new Logger(SignatureVerifier.name);

  constructor(private readonly createHmac: HmacFactory = defaultHmacFactory) {}

  /**
   * Check a signature header against a body.
   *
   * Returns false for unsupported schemes, malformed hex and mismatches.
   * Throws HmacUnavailableError when the digest cannot be computed.
   *
   * @param encoding - charset used to turn a text body back into bytes (default utf-8)
   */
  verify(
    signatureHeader: string,
    rawBody: Buffer | string,
    secret: string,
    encoding = 'utf-8',
  ): boolean {
    if (!signatureHeader.startsWith(SIGNATURE_256_PREFIX)) {
      this.logger.debug('Unsupported webhook signature type');
      return false;
    }

    const provided = this.decodeHex(
      signatureHeader.slice(SIGNATURE_256_PREFIX.length),
    );
    if (!provided) {
      this.logger.debug('Invalid webhook signature encoding');
      return false;
    }

    const expected = this.computeSignature(this.toBytes(rawBody, encoding), secret);

    return this.timingSafeEqual(provided, expected);
  }

  /**
   * Raw HMAC-SHA256 digest of the payload
   */
  computeSignature(payload: Buffer, secret: string): Buffer {
    try {
      return this.createHmac(Buffer.from(secret, 'utf8'))
        .update(payload)
        .digest();
    } catch (error) {
      throw new HmacUnavailableError(
        'HMAC-SHA256 is not available in this runtime',
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  /**
   * Header value (`sha256=<hex>`) for the payload
   */
  sign(payload: Buffer | string, secret: string, encoding = 'utf-8'): string {
    const digest = this.computeSignature(this.toBytes(payload, encoding), secret);
    return `${SIGNATURE_256_PREFIX}${digest.toString('hex')}`;
  }

  private decodeHex(value: string): Buffer | undefined {
    if (!HEX_PATTERN.test(value)) {
      return undefined;
    }
    return Buffer.from(value, 'hex');
  }

  private toBytes(body: Buffer | string, encoding: string): Buffer {
    if (Buffer.isBuffer(body)) {
      return body;
    }
    if (!iconv.encodingExists(encoding)) {
      throw new UnsupportedCharsetError(encoding);
    }
    return iconv.encode(body, encoding);
  }

  /**
   * Constant-time comparison; unequal lengths never match
   */
  private timingSafeEqual(a: Buffer, b: Buffer): boolean {
    if (a.length !== b.length) {
      return false;
    }
    return crypto.timingSafeEqual(a, b);
  }
}
