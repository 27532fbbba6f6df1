import { HttpStatus } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  PipelineConfig,
  PipelineStage,
  WebhookContext,
  ProcessingResult,
  ProcessingMetrics,
  PipelineError,
  Rejection,
} from './types';
import { GateStage } from './stages/gate.stage';
import { ReadBodyStage } from './stages/read-body.stage';
import { VerificationStage } from './stages/verification.stage';
import { DecodeStage } from './stages/decode.stage';
import { DispatchStage } from './stages/dispatch.stage';
import { IncomingWebhookRequest } from '../domain/models';
import { ProcessingState, ProcessingStatus } from '../domain/enums';
import { LifecycleHooks } from '../interfaces';
import { SignatureVerifier } from '../verification';

/**
 * WebhookProcessor runs every inbound request through the pipeline
 *
 * Pipeline stages:
 * 1. Gate - secret configured, signature present, declared size within cap
 * 2. Read body - raw bytes, bounded by the cap
 * 3. Verification - HMAC-SHA256 signature
 * 4. Decode - event name header and JSON object body
 * 5. Dispatch - hand the event to the active dispatcher
 *
 * Client and configuration problems resolve to a ProcessingResult carrying
 * the HTTP status. Environment and dispatch failures are thrown as
 * PipelineError.
 */
export class WebhookProcessor {
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks;
    this.stages = this.initializeStages();
  }

  /**
   * Process a webhook through the pipeline
   */
  async processWebhook(request: IncomingWebhookRequest): Promise<ProcessingResult> {
    const startTime = Date.now();

    const context: WebhookContext = {
      request,
      receivedAt: new Date(),
      processingId: uuidv4(),
      state: ProcessingState.GATING,
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      signatureVerified: false,
      decoded: false,
      dispatched: false,
    };

    let rejection: Rejection | undefined;
    try {
      rejection = await this.executePipeline(context, metrics);
    } catch (error) {
      metrics.totalDurationMs = Date.now() - startTime;
      await this.reportFate(
        context,
        ProcessingStatus.INTERNAL_ERROR,
        HttpStatus.INTERNAL_SERVER_ERROR,
        metrics.totalDurationMs,
      );
      throw error;
    }

    context.state = rejection ? ProcessingState.REJECTED : ProcessingState.DONE;
    metrics.totalDurationMs = Date.now() - startTime;

    const result: ProcessingResult = rejection
      ? {
          success: false,
          processingStatus: rejection.processingStatus,
          httpStatus: rejection.httpStatus,
          message: rejection.message,
          context,
          metrics,
        }
      : {
          success: true,
          processingStatus: ProcessingStatus.ACCEPTED,
          httpStatus: HttpStatus.OK,
          event: context.event,
          context,
          metrics,
        };

    await this.reportFate(
      context,
      result.processingStatus,
      result.httpStatus,
      metrics.totalDurationMs,
    );

    return result;
  }

  private async reportFate(
    context: WebhookContext,
    processingStatus: ProcessingStatus,
    httpStatus: number,
    latencyMs: number,
  ): Promise<void> {
    if (this.hooks?.onWebhookFate) {
      await this.hooks.onWebhookFate({
        processingId: context.processingId,
        processingStatus,
        httpStatus,
        eventType: context.eventType,
        latencyMs,
      });
    }
  }

  /**
   * Execute the pipeline stages sequentially
   *
   * @returns the rejection that ended the run, if any
   */
  private async executePipeline(
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): Promise<Rejection | undefined> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();
      context.state = stage.state;

      try {
        const result = await stage.execute(context);
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (result.rejection) {
          return result.rejection;
        }

        this.updateMetrics(stage.name, metrics);

        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);
        context.state = ProcessingState.FAILED;

        const cause = error instanceof Error ? error : new Error(String(error));

        if (this.hooks?.onError) {
          await this.hooks.onError(cause, {
            operation: 'webhook-processing',
            processingId: context.processingId,
            stage: stage.name,
            eventType: context.eventType,
          });
        }

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${cause.message}`,
          stage.name,
          context,
          cause,
        );
      }
    }

    return undefined;
  }

  private initializeStages(): PipelineStage[] {
    return [
      new GateStage(this.config.credentials),
      new ReadBodyStage(),
      new VerificationStage(this.config.verifier ?? new SignatureVerifier()),
      new DecodeStage(),
      new DispatchStage(this.config.dispatcher),
    ];
  }

  private updateMetrics(stageName: string, metrics: ProcessingMetrics): void {
    switch (stageName) {
      case 'verification':
        metrics.signatureVerified = true;
        break;
      case 'decode':
        metrics.decoded = true;
        break;
      case 'dispatch':
        metrics.dispatched = true;
        break;
    }
  }
}
