import { HttpStatus, Logger } from '@nestjs/common';
import { PipelineStage, WebhookContext, StageResult, proceed, reject } from '../types';
import { ProcessingState, ProcessingStatus } from '../../domain/enums';
import { SignatureVerifier } from '../../verification';

/**
 * Stage 3: Signature Verification
 * HMAC-SHA256 of the raw body against the secret snapshot taken at the gate
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';
  state = ProcessingState.VERIFYING;

  private readonly logger = new Logger(VerificationStage.name);

  constructor(private readonly verifier: SignatureVerifier) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const { secret, signature, rawBody } = context;
    if (secret === undefined || signature === undefined || rawBody === undefined) {
      throw new Error('Verification requires the gate snapshot and the request body');
    }

    // HmacUnavailableError propagates: an environment fault is not a 401
    const isValid = this.verifier.verify(signature, rawBody, secret);
    context.signatureValid = isValid;

    if (!isValid) {
      this.logger.debug(`Invalid webhook signature ${context.processingId}`);
      return reject(context, {
        processingStatus: ProcessingStatus.SIGNATURE_FAILED,
        httpStatus: HttpStatus.UNAUTHORIZED,
        message: 'Invalid request signature',
      });
    }

    return proceed(context);
  }
}
