import { Logger } from '@nestjs/common';
import { WebhookEvent } from '../../domain/models';
import { EventHandler } from '../../interfaces';

export type EventLogLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Logging event handler
 * Logs dispatched webhook events at debug level
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Pick<Logger, 'debug'> = new Logger(LoggingEventHandler.name),
    private readonly logLevel: EventLogLevel = 'normal',
  ) {}

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (event: WebhookEvent) => {
      this.logger.debug(
        `[Webhook Event] ${event.qualifiedType} ${JSON.stringify(this.prepareLogData(event))}`,
      );
    };
  }

  /**
   * Prepare log data based on log level
   */
  prepareLogData(event: WebhookEvent): Record<string, unknown> {
    switch (this.logLevel) {
      case 'verbose':
        return {
          deliveryId: event.deliveryId,
          receivedAt: event.receivedAt.toISOString(),
          payload: event.payload,
        };

      case 'minimal':
        return { deliveryId: event.deliveryId };

      case 'normal':
      default:
        return {
          deliveryId: event.deliveryId,
          receivedAt: event.receivedAt.toISOString(),
          action: event.action,
          repository: repositoryName(event.payload.repository),
        };
    }
  }
}

function repositoryName(repository: unknown): string | undefined {
  if (typeof repository !== 'object' || repository === null || !('full_name' in repository)) {
    return undefined;
  }
  return typeof repository.full_name === 'string' ? repository.full_name : undefined;
}
