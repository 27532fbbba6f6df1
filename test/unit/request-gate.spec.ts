import {
  classifyRequest,
  GateStage,
  InMemoryWebhookRequest,
  MAX_REQUEST_BODY_SIZE,
  ProcessingState,
  ProcessingStatus,
  WebhookContext,
  WebhookCredentials,
} from '../../src';

function request(
  headers: Record<string, string>,
  contentLength: number | null = 7,
): InMemoryWebhookRequest {
  return new InMemoryWebhookRequest(Buffer.from('{"a":1}'), headers, {
    contentLength,
  });
}

describe('RequestGate', () => {
  const signed = { 'x-hub-signature-256': 'sha256=00' };

  describe('classifyRequest', () => {
    it('should proceed with the secret snapshot and signature', () => {
      const decision = classifyRequest(request(signed), 'test-secret');

      expect(decision).toEqual({
        proceed: true,
        secret: 'test-secret',
        signature: 'sha256=00',
      });
    });

    it('should reject with 500 when no secret is configured', () => {
      for (const secret of [undefined, '']) {
        const decision = classifyRequest(request(signed), secret);

        expect(decision).toEqual({
          proceed: false,
          rejection: {
            processingStatus: ProcessingStatus.MISCONFIGURED,
            httpStatus: 500,
            message: 'Misconfigured webhook server',
          },
        });
      }
    });

    it('should reject with 401 when the signature header is missing or empty', () => {
      const cases: Record<string, string>[] = [{}, { 'x-hub-signature-256': '' }];
      for (const headers of cases) {
        const decision = classifyRequest(request(headers), 'test-secret');

        expect(decision).toEqual({
          proceed: false,
          rejection: {
            processingStatus: ProcessingStatus.MISSING_SIGNATURE,
            httpStatus: 401,
            message: 'Missing request signature',
          },
        });
      }
    });

    it('should accept a declared length equal to the cap', () => {
      const decision = classifyRequest(
        request(signed, MAX_REQUEST_BODY_SIZE),
        'test-secret',
      );

      expect(MAX_REQUEST_BODY_SIZE).toBe(131072);
      expect(decision.proceed).toBe(true);
    });

    it('should reject a declared length one byte over the cap with 400', () => {
      const decision = classifyRequest(request(signed, 131073), 'test-secret');

      expect(decision).toEqual({
        proceed: false,
        rejection: {
          processingStatus: ProcessingStatus.OVERSIZE_BODY,
          httpStatus: 400,
          message: 'Oversize request body',
        },
      });
    });

    it('should let an undeclared length through to the bounded read', () => {
      const decision = classifyRequest(request(signed, null), 'test-secret');

      expect(decision.proceed).toBe(true);
    });

    it('should report the first failing check', () => {
      const unsignedOversize = request({}, 200000);

      const noSecret = classifyRequest(unsignedOversize, undefined);
      const withSecret = classifyRequest(unsignedOversize, 'test-secret');

      expect(noSecret.proceed === false && noSecret.rejection.httpStatus).toBe(500);
      expect(withSecret.proceed === false && withSecret.rejection.httpStatus).toBe(401);
    });
  });

  describe('GateStage', () => {
    function context(req: InMemoryWebhookRequest): WebhookContext {
      return {
        request: req,
        receivedAt: new Date(),
        processingId: 'proc-1',
        state: ProcessingState.GATING,
      };
    }

    it('should store the secret snapshot and signature on the context', async () => {
      const credentials = new WebhookCredentials({ webhookSecret: 'test-secret' });
      const stage = new GateStage(credentials);

      const result = await stage.execute(context(request(signed)));

      expect(result.shouldContinue).toBe(true);
      expect(result.rejection).toBeUndefined();
      expect(result.context.secret).toBe('test-secret');
      expect(result.context.signature).toBe('sha256=00');
    });

    it('should stop without reading the body when rejecting', async () => {
      const stage = new GateStage(new WebhookCredentials());
      const req = request(signed);

      const result = await stage.execute(context(req));

      expect(result.shouldContinue).toBe(false);
      expect(result.rejection?.httpStatus).toBe(500);
      expect(req.readCount).toBe(0);
    });
  });
});
