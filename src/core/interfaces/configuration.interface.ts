import { ProcessingStatus } from '../domain/enums';

/**
 * Lifecycle hooks for monitoring
 */
export interface LifecycleHooks {
  /**
   * Called once per handled request when its fate is determined
   */
  onWebhookFate?: (event: WebhookFateEvent) => void | Promise<void>;

  /**
   * Called when a request fails with an internal error
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

/**
 * Webhook fate event
 */
export interface WebhookFateEvent {
  processingId: string;
  processingStatus: ProcessingStatus;
  httpStatus: number;
  eventType?: string;
  latencyMs: number;
}

/**
 * Error context
 */
export interface ErrorContext {
  operation: string;
  processingId: string;
  stage: string;
  eventType?: string;
}
