import { IncomingWebhookRequest, WebhookEvent, WebhookPayload } from '../domain/models';
import { ProcessingStatus, ProcessingState } from '../domain/enums';
import { Credentials, EventDispatcherProvider, LifecycleHooks } from '../interfaces';
import { SignatureVerifier } from '../verification';

/**
 * Webhook processing context passed through the pipeline
 */
export interface WebhookContext {
  // Raw input
  request: IncomingWebhookRequest;
  receivedAt: Date;

  // Processing metadata
  processingId: string;
  state: ProcessingState;

  // Gate results; the secret is snapshotted once per request
  secret?: string;
  signature?: string;

  // Body
  rawBody?: Buffer;

  // Verification results
  signatureValid?: boolean;

  // Decoded data
  eventType?: string;
  payload?: WebhookPayload;
  event?: WebhookEvent;
}

/**
 * Terminal classification of a request that must not proceed
 */
export interface Rejection {
  processingStatus: ProcessingStatus;
  httpStatus: number;
  message: string;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  context: WebhookContext;
  shouldContinue: boolean;
  rejection?: Rejection;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  state: ProcessingState;
  execute(context: WebhookContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  credentials: Credentials;
  dispatcher: EventDispatcherProvider;
  verifier?: SignatureVerifier;

  // Lifecycle hooks
  hooks?: LifecycleHooks;
}

/**
 * Processing result returned by the pipeline
 */
export interface ProcessingResult {
  success: boolean;
  processingStatus: ProcessingStatus;
  httpStatus: number;
  message?: string;
  event?: WebhookEvent;
  context: WebhookContext;
  metrics: ProcessingMetrics;
}

/**
 * Processing metrics
 */
export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  signatureVerified: boolean;
  decoded: boolean;
  dispatched: boolean;
}

export function proceed(context: WebhookContext): StageResult {
  return { context, shouldContinue: true };
}

export function reject(context: WebhookContext, rejection: Rejection): StageResult {
  return { context, shouldContinue: false, rejection };
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: string,
    public context: WebhookContext,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * No EventDispatcher is registered to receive events
 */
export class DispatcherUnavailableError extends Error {
  constructor(public eventType: string) {
    super(`No event dispatcher registered for ${eventType}`);
    this.name = 'DispatcherUnavailableError';
  }
}
