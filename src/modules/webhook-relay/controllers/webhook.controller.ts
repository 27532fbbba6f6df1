import { IncomingMessage } from 'http';
import {
  All,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Inject,
  MethodNotAllowedException,
  Post,
  RawBodyRequest,
  Req,
} from '@nestjs/common';
import { ApiExcludeEndpoint, ApiTags } from '@nestjs/swagger';
import { WebhookProcessor } from '../../../core';
import { fromIncomingMessage } from '../../../adapters/http';
import { ApiWebhookEndpoint } from '../../../_shared';
import { WEBHOOK_PROCESSOR } from '../constants';

/**
 * Webhook Controller
 *
 * Receives CI webhooks. The pipeline reads the body itself, so the
 * application runs with `bodyParser: false`, or with `rawBody: true` to
 * hand over the buffered bytes.
 */
@ApiTags('Ingest')
@Controller('webhooks')
export class WebhookController {
  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiWebhookEndpoint()
  async handleWebhook(@Req() req: RawBodyRequest<IncomingMessage>): Promise<void> {
    const result = await this.webhookProcessor.processWebhook(
      fromIncomingMessage(req),
    );

    if (!result.success) {
      throw new HttpException(
        result.message ?? 'Webhook rejected',
        result.httpStatus,
      );
    }
  }

  @All()
  @ApiExcludeEndpoint()
  rejectMethod(): never {
    throw new MethodNotAllowedException();
  }
}
