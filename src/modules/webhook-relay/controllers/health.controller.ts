import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { DynamicEventDispatcher, WebhookCredentials } from '../../../core';
import { CREDENTIALS, EVENT_DISPATCHER } from '../constants';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
} from '../../../_shared';

export interface HealthStatus {
  status: 'healthy';
  timestamp: Date;
  uptime: number;
}

export interface ReadinessStatus {
  status: 'ready' | 'not_ready';
  checks: {
    webhookSecret: boolean;
    dispatcher: boolean;
  };
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(CREDENTIALS)
    private readonly credentials: WebhookCredentials,
    @Inject(EVENT_DISPATCHER)
    private readonly dispatcher: DynamicEventDispatcher,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): HealthStatus {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  readiness(): ReadinessStatus {
    const checks = {
      webhookSecret: this.credentials.isConfigured(),
      dispatcher: this.dispatcher.get() !== undefined,
    };

    return {
      status: checks.webhookSecret && checks.dispatcher ? 'ready' : 'not_ready',
      checks,
    };
  }
}
