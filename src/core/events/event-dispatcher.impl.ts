import { Logger } from '@nestjs/common';
import { WebhookEvent } from '../domain/models';
import {
  DispatchPermissionError,
  EventDispatcher,
  EventHandler,
  EventSubscription,
} from '../interfaces';

/**
 * Default in-process EventDispatcher
 *
 * Fans webhook events out to handlers registered per event type and to
 * global handlers. Handler failures are isolated and logged, except for
 * DispatchPermissionError which rejects the whole post.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<string, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  /**
   * Register an event handler for a specific event type
   */
  on(eventType: string, handler: EventHandler): EventSubscription {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  /**
   * Register a handler for all event types
   */
  onAll(handler: EventHandler): EventSubscription {
    this.globalHandlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  /**
   * Remove an event handler
   */
  off(eventType: string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  /**
   * Deliver an event to every matching handler and wait for all of them
   */
  async postEvent(event: WebhookEvent): Promise<void> {
    const handlers = this.getHandlers(event.type);

    const results = await Promise.allSettled(
      handlers.map(async (handler) => handler(event)),
    );

    let permissionError: DispatchPermissionError | undefined;
    const errors: Array<{ handler: string; error: unknown }> = [];

    for (const [index, result] of results.entries()) {
      if (result.status === 'fulfilled') {
        continue;
      }
      if (result.reason instanceof DispatchPermissionError) {
        permissionError ??= result.reason;
        continue;
      }
      errors.push({
        handler: handlers[index].name || 'anonymous',
        error: result.reason,
      });
    }

    if (errors.length > 0) {
      this.logger.error(
        `Event dispatch errors for ${event.type}: ${errors
          .map(({ handler, error }) => `${handler}: ${error instanceof Error ? error.message : String(error)}`)
          .join('; ')}`,
      );
    }

    if (permissionError) {
      throw permissionError;
    }
  }

  /**
   * Get all handlers for an event type, global handlers last
   */
  getHandlers(eventType: string): EventHandler[] {
    const specificHandlers = Array.from(this.handlers.get(eventType) ?? []);
    return [...specificHandlers, ...this.globalHandlers];
  }
}
