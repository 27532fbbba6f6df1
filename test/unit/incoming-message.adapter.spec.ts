import { IncomingMessage, IncomingHttpHeaders } from 'http';
import { Socket } from 'net';
import { once } from 'events';
import { RawBodyRequest } from '@nestjs/common';
import {
  BodyAlreadyConsumedError,
  fromIncomingMessage,
  parseContentLength,
  RequestBodyError,
} from '../../src';

function message(headers: IncomingHttpHeaders, body?: string): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.method = 'POST';
  req.headers = headers;
  if (body !== undefined) {
    req.push(Buffer.from(body));
  }
  req.push(null);
  return req;
}

describe('IncomingMessage adapter', () => {
  describe('parseContentLength', () => {
    it.each([
      ['7', 7],
      ['131073', 131073],
      [undefined, undefined],
      ['', undefined],
      ['-1', undefined],
      ['12abc', undefined],
    ])('should parse %p', (value, expected) => {
      expect(parseContentLength(value)).toBe(expected);
    });
  });

  it('should expose method, headers and declared length', () => {
    const request = fromIncomingMessage(
      message({ 'content-length': '7', 'x-github-event': 'push' }, '{"a":1}'),
    );

    expect(request.method).toBe('POST');
    expect(request.contentLength).toBe(7);
    expect(request.headers['x-github-event']).toBe('push');
  });

  it('should read the raw body', async () => {
    const request = fromIncomingMessage(message({ 'content-length': '7' }, '{"a":1}'));

    const body = await request.readBody(131072);

    expect(body.toString('utf8')).toBe('{"a":1}');
  });

  it('should fail with too_large when the stream passes the limit', async () => {
    const request = fromIncomingMessage(message({}, 'x'.repeat(20)));

    await expect(request.readBody(10)).rejects.toMatchObject({
      name: 'RequestBodyError',
      reason: 'too_large',
    });
  });

  it('should fail with length_mismatch when the body is shorter than declared', async () => {
    const request = fromIncomingMessage(message({ 'content-length': '10' }, '{"a":1}'));

    const error = await request.readBody(131072).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RequestBodyError);
    expect(error).toMatchObject({ reason: 'length_mismatch' });
  });

  it('should use the body buffered by the framework', async () => {
    const req: RawBodyRequest<IncomingMessage> = message({ 'content-length': '7' }, '{"a":1}');
    req.rawBody = Buffer.from('{"b":2}');

    const body = await fromIncomingMessage(req).readBody(131072);

    expect(body.toString('utf8')).toBe('{"b":2}');
  });

  it('should apply the limit to a buffered body', async () => {
    const req: RawBodyRequest<IncomingMessage> = message({});
    req.rawBody = Buffer.from('x'.repeat(20));

    await expect(fromIncomingMessage(req).readBody(10)).rejects.toMatchObject({
      name: 'RequestBodyError',
      reason: 'too_large',
    });
  });

  it('should name the body parser when the stream was already consumed', async () => {
    const req = message({ 'content-length': '7' }, '{"a":1}');
    req.resume();
    await once(req, 'end');

    const error = await fromIncomingMessage(req).readBody(131072).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BodyAlreadyConsumedError);
    expect(error instanceof Error && error.message).toContain('bodyParser: false');
  });
});
