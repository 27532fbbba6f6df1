import { WebhookEvent } from '../domain/models';

/**
 * Event handler function signature
 */
export type EventHandler = (event: WebhookEvent) => Promise<void> | void;

/**
 * Handle returned by a handler registration
 */
export interface EventSubscription {
  id: string;
  unsubscribe(): void;
}

/**
 * Downstream consumer of authenticated webhook events
 */
export interface EventDispatcher {
  /**
   * Deliver an event. Rejects with DispatchPermissionError when the event
   * may not be published.
   */
  postEvent(event: WebhookEvent): Promise<void>;
}

/**
 * Resolves the dispatcher that is active at the moment of the call
 */
export interface EventDispatcherProvider {
  get(): EventDispatcher | undefined;
}

/**
 * Raised by a dispatcher that refuses an event for permission reasons
 */
export class DispatchPermissionError extends Error {
  constructor(
    message: string,
    public readonly eventType: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DispatchPermissionError';
  }
}
