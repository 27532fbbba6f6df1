import { DynamicModule, Global, Logger, Module, Provider } from '@nestjs/common';
import {
  WebhookRelayModuleConfig,
  WebhookRelayModuleAsyncConfig,
  mergeWebhookRelayConfig,
} from './webhook-relay.config';
import {
  WebhookCredentials,
  EventDispatcherImpl,
  DynamicEventDispatcher,
  LoggingEventHandler,
  WebhookProcessor,
} from '../../core';
import { WebhookController, HealthController } from './controllers';
import {
  WEBHOOK_RELAY_CONFIG,
  CREDENTIALS,
  EVENT_DISPATCHER,
  WEBHOOK_PROCESSOR,
} from './constants';

const logger = new Logger('WebhookRelayModule');

/**
 * Webhook Relay Module - Main NestJS Module
 *
 * Wires credentials, the dispatcher reference and the processor once at
 * startup. Exposes POST /webhooks and the health endpoints.
 */
@Global()
@Module({})
export class WebhookRelayModule {
  /**
   * Configure synchronously
   */
  static forRoot(config: WebhookRelayModuleConfig): DynamicModule {
    return {
      module: WebhookRelayModule,
      providers: [
        {
          provide: WEBHOOK_RELAY_CONFIG,
          useValue: mergeWebhookRelayConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: this.exportedTokens(),
    };
  }

  /**
   * Configure asynchronously
   */
  static forRootAsync(options: WebhookRelayModuleAsyncConfig): DynamicModule {
    return {
      module: WebhookRelayModule,
      imports: options.imports || [],
      providers: [
        {
          provide: WEBHOOK_RELAY_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeWebhookRelayConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: this.exportedTokens(),
    };
  }

  private static exportedTokens() {
    return [
      WEBHOOK_RELAY_CONFIG,
      CREDENTIALS,
      EVENT_DISPATCHER,
      EventDispatcherImpl,
      WEBHOOK_PROCESSOR,
    ];
  }

  /**
   * Providers that depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: CREDENTIALS,
        useFactory: async (config: WebhookRelayModuleConfig) => {
          const credentials = new WebhookCredentials(config.credentials);

          if (config.credentials.secretFile) {
            try {
              await credentials.reload();
            } catch (error) {
              logger.warn(
                `Could not load webhook secret file: ${error instanceof Error ? error.message : String(error)}`,
              );
            }
          }

          if (!credentials.isConfigured()) {
            logger.warn('webhook-secret not configured');
          }

          return credentials;
        },
        inject: [WEBHOOK_RELAY_CONFIG],
      },
      {
        provide: EventDispatcherImpl,
        useFactory: (config: WebhookRelayModuleConfig) => {
          const dispatcher = new EventDispatcherImpl();

          if (config.events?.enableLogging) {
            const loggingHandler = new LoggingEventHandler(undefined, config.events.logLevel);
            dispatcher.onAll(loggingHandler.getHandler());
          }

          for (const { eventType, handler } of config.events?.handlers ?? []) {
            dispatcher.on(eventType, handler);
          }

          return dispatcher;
        },
        inject: [WEBHOOK_RELAY_CONFIG],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (dispatcher: EventDispatcherImpl) =>
          new DynamicEventDispatcher(dispatcher),
        inject: [EventDispatcherImpl],
      },
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          config: WebhookRelayModuleConfig,
          credentials: WebhookCredentials,
          dispatcher: DynamicEventDispatcher,
        ) =>
          new WebhookProcessor({
            credentials,
            dispatcher,
            hooks: config.hooks,
          }),
        inject: [WEBHOOK_RELAY_CONFIG, CREDENTIALS, EVENT_DISPATCHER],
      },
    ];
  }
}
