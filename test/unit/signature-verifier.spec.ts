import * as crypto from 'crypto';
import {
  SignatureVerifier,
  HmacUnavailableError,
  UnsupportedCharsetError,
} from '../../src';

function hmacHex(body: Buffer | string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(body).digest('hex');
}

describe('SignatureVerifier', () => {
  let verifier: SignatureVerifier;

  beforeEach(() => {
    verifier = new SignatureVerifier();
  });

  describe('verify', () => {
    const secret = 'test-secret';
    const body = Buffer.from('{"action":"completed","workflow_run":{"id":42}}');

    it('should accept a valid sha256 signature', () => {
      const header = `sha256=${hmacHex(body, secret)}`;

      expect(verifier.verify(header, body, secret)).toBe(true);
    });

    it('should accept upper-case hex', () => {
      const header = `sha256=${hmacHex(body, secret).toUpperCase()}`;

      expect(verifier.verify(header, body, secret)).toBe(true);
    });

    it('should reject a signature made with a different secret', () => {
      const header = `sha256=${hmacHex(body, 'other-secret')}`;

      expect(verifier.verify(header, body, secret)).toBe(false);
    });

    it('should reject a signature with one hex character flipped', () => {
      const hex = hmacHex(body, secret);
      const flipped = hex.slice(0, -1) + (hex.endsWith('0') ? '1' : '0');

      expect(verifier.verify(`sha256=${flipped}`, body, secret)).toBe(false);
    });

    it('should reject a signature for a different body', () => {
      const header = `sha256=${hmacHex('{"action":"requested"}', secret)}`;

      expect(verifier.verify(header, body, secret)).toBe(false);
    });

    it('should reject a truncated signature', () => {
      const header = `sha256=${hmacHex(body, secret).slice(0, 62)}`;

      expect(verifier.verify(header, body, secret)).toBe(false);
    });

    it('should reject other signature schemes without computing a digest', () => {
      const createHmac = jest.fn((key: Buffer) => crypto.createHmac('sha256', key));
      const spied = new SignatureVerifier(createHmac);
      const sha1 = crypto.createHmac('sha1', secret).update(body).digest('hex');

      expect(spied.verify(`sha1=${sha1}`, body, secret)).toBe(false);
      expect(spied.verify(hmacHex(body, secret), body, secret)).toBe(false);
      expect(createHmac).not.toHaveBeenCalled();
    });

    it.each([
      ['non-hex digits', 'sha256=zz'],
      ['odd length', 'sha256=abc'],
      ['empty suffix', 'sha256='],
      ['embedded whitespace', 'sha256=ab cd'],
    ])('should return false for %s', (_label, header) => {
      expect(() => verifier.verify(header, body, secret)).not.toThrow();
      expect(verifier.verify(header, body, secret)).toBe(false);
    });

    it('should encode a text body with the declared charset', () => {
      const text = '{"name":"café"}';
      const header = `sha256=${hmacHex(Buffer.from(text, 'latin1'), secret)}`;

      expect(verifier.verify(header, text, secret, 'iso-8859-1')).toBe(true);
      expect(verifier.verify(header, text, secret)).toBe(false);
    });

    it('should throw for a text body in an unknown charset', () => {
      expect(() =>
        verifier.verify(`sha256=${hmacHex(body, secret)}`, 'text', secret, 'x-unknown'),
      ).toThrow(UnsupportedCharsetError);
    });

    it('should raise HmacUnavailableError when the primitive fails', () => {
      const broken = new SignatureVerifier(() => {
        throw new Error('digital envelope routines::unsupported');
      });

      expect(() =>
        broken.verify(`sha256=${hmacHex(body, secret)}`, body, secret),
      ).toThrow(HmacUnavailableError);
    });
  });

  describe('sign', () => {
    it('should produce the RFC-style HMAC-SHA256 header value', () => {
      expect(
        verifier.sign('The quick brown fox jumps over the lazy dog', 'key'),
      ).toBe(
        'sha256=f7bc83f430538424b13298e6aa6fb143ef4d59a14946175997479dbc2d1a3cd8',
      );
    });

    it('should round-trip through verify', () => {
      const body = Buffer.from('{"a":1}');
      const header = verifier.sign(body, 'topsecret');

      expect(verifier.verify(header, body, 'topsecret')).toBe(true);
      expect(verifier.verify(header, body, 'topsecret2')).toBe(false);
    });
  });
});
