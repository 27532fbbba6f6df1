import { HttpStatus, Logger } from '@nestjs/common';
import { PipelineStage, WebhookContext, StageResult, proceed, reject } from '../types';
import { MAX_REQUEST_BODY_SIZE } from '../constants';
import { RequestBodyError } from '../../domain/models';
import { ProcessingState, ProcessingStatus } from '../../domain/enums';

/**
 * Stage 2: Read body
 * Pulls the raw bytes off the connection, never more than the cap
 */
export class ReadBodyStage implements PipelineStage {
  name = 'read-body';
  state = ProcessingState.READING;

  private readonly logger = new Logger(ReadBodyStage.name);

  constructor(private readonly maxBodySize = MAX_REQUEST_BODY_SIZE) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    try {
      context.rawBody = await context.request.readBody(this.maxBodySize);
      return proceed(context);
    } catch (error) {
      if (!(error instanceof RequestBodyError)) {
        throw error;
      }

      this.logger.debug(`Could not read webhook body ${context.processingId}: ${error.message}`);

      if (error.reason === 'too_large') {
        return reject(context, {
          processingStatus: ProcessingStatus.OVERSIZE_BODY,
          httpStatus: HttpStatus.BAD_REQUEST,
          message: 'Oversize request body',
        });
      }

      return reject(context, {
        processingStatus: ProcessingStatus.BODY_READ_FAILED,
        httpStatus: HttpStatus.BAD_REQUEST,
        message: 'Invalid request body',
      });
    }
  }
}
