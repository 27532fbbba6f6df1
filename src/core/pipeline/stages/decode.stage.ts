import { HttpStatus, Logger } from '@nestjs/common';
import { PipelineStage, WebhookContext, StageResult, proceed, reject } from '../types';
import { CONTENT_TYPE_HEADER, DELIVERY_ID_HEADER, EVENT_TYPE_HEADER } from '../constants';
import { WebhookEvent, headerValue } from '../../domain/models';
import { ProcessingState, ProcessingStatus } from '../../domain/enums';
import { PayloadDecoder } from '../../decoding';

/**
 * Stage 4: Decode
 * Event name from its header, then the body as a JSON object.
 * Runs only for authenticated requests, so event semantics are never
 * reported to unauthenticated callers.
 */
export class DecodeStage implements PipelineStage {
  name = 'decode';
  state = ProcessingState.DECODING;

  private readonly logger = new Logger(DecodeStage.name);

  constructor(private readonly decoder: PayloadDecoder = new PayloadDecoder()) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    if (context.signatureValid !== true || context.rawBody === undefined) {
      throw new Error('Decoding requires a verified request body');
    }

    const { headers } = context.request;

    const eventType = headerValue(headers, EVENT_TYPE_HEADER);
    if (eventType === undefined || eventType.trim() === '') {
      this.logger.warn('Received webhook without x-github-event header (authenticated)');
      return reject(context, {
        processingStatus: ProcessingStatus.MISSING_EVENT_TYPE,
        httpStatus: HttpStatus.BAD_REQUEST,
        message: 'Missing event name header',
      });
    }
    context.eventType = eventType;

    const decoded = this.decoder.decode(
      context.rawBody,
      headerValue(headers, CONTENT_TYPE_HEADER),
    );

    if (!decoded.ok) {
      if (decoded.error === 'unsupported_charset') {
        this.logger.warn(`Received webhook with unsupported charset ${decoded.charset} (authenticated)`);
        return reject(context, {
          processingStatus: ProcessingStatus.PARSE_ERROR,
          httpStatus: HttpStatus.BAD_REQUEST,
          message: 'Unsupported charset',
        });
      }

      this.logger.warn('Received invalid JSON (authenticated)');
      return reject(context, {
        processingStatus: ProcessingStatus.PARSE_ERROR,
        httpStatus: HttpStatus.BAD_REQUEST,
        message: 'Invalid JSON',
      });
    }

    context.payload = decoded.payload;
    context.event = new WebhookEvent(
      eventType,
      decoded.payload,
      headerValue(headers, DELIVERY_ID_HEADER) ?? context.processingId,
      context.receivedAt,
    );

    this.logger.debug(`Received webhook (${eventType})`);

    return proceed(context);
  }
}
