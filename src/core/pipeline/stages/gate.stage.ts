import { HttpStatus, Logger } from '@nestjs/common';
import {
  PipelineStage,
  WebhookContext,
  StageResult,
  Rejection,
  proceed,
  reject,
} from '../types';
import { MAX_REQUEST_BODY_SIZE, SIGNATURE_HEADER } from '../constants';
import { IncomingWebhookRequest, headerValue } from '../../domain/models';
import { ProcessingState, ProcessingStatus } from '../../domain/enums';
import { Credentials } from '../../interfaces';

export type GateDecision =
  | { proceed: true; secret: string; signature: string }
  | { proceed: false; rejection: Rejection };

/**
 * Classify a request before its body is touched.
 * Checks run in order and the first failure wins.
 */
export function classifyRequest(
  request: IncomingWebhookRequest,
  secret: string | undefined,
  maxBodySize = MAX_REQUEST_BODY_SIZE,
): GateDecision {
  if (!secret) {
    return {
      proceed: false,
      rejection: {
        processingStatus: ProcessingStatus.MISCONFIGURED,
        httpStatus: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Misconfigured webhook server',
      },
    };
  }

  const signature = headerValue(request.headers, SIGNATURE_HEADER);
  if (!signature) {
    return {
      proceed: false,
      rejection: {
        processingStatus: ProcessingStatus.MISSING_SIGNATURE,
        httpStatus: HttpStatus.UNAUTHORIZED,
        message: 'Missing request signature',
      },
    };
  }

  if (request.contentLength !== undefined && request.contentLength > maxBodySize) {
    return {
      proceed: false,
      rejection: {
        processingStatus: ProcessingStatus.OVERSIZE_BODY,
        httpStatus: HttpStatus.BAD_REQUEST,
        message: 'Oversize request body',
      },
    };
  }

  return { proceed: true, secret, signature };
}

/**
 * Stage 1: Gate
 * Cheap precondition checks; nothing past this stage runs for a rejected request
 */
export class GateStage implements PipelineStage {
  name = 'gate';
  state = ProcessingState.GATING;

  private readonly logger = new Logger(GateStage.name);

  constructor(
    private readonly credentials: Credentials,
    private readonly maxBodySize = MAX_REQUEST_BODY_SIZE,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const decision = classifyRequest(
      context.request,
      this.credentials.getWebhookSecret(),
      this.maxBodySize,
    );

    if (!decision.proceed) {
      if (decision.rejection.processingStatus === ProcessingStatus.MISCONFIGURED) {
        this.logger.warn('webhook-secret not configured');
      } else {
        this.logger.debug(`Rejected webhook ${context.processingId}: ${decision.rejection.message}`);
      }
      return reject(context, decision.rejection);
    }

    context.secret = decision.secret;
    context.signature = decision.signature;

    return proceed(context);
  }
}
