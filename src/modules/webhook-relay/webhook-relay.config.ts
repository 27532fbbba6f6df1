import { ModuleMetadata, InjectionToken, OptionalFactoryDependency } from '@nestjs/common';
import {
  CredentialsOptions,
  EventHandler,
  EventLogLevel,
  LifecycleHooks,
} from '../../core';

/**
 * Webhook Relay Module Configuration
 */
export interface WebhookRelayModuleConfig {
  /**
   * Where the shared webhook secret comes from
   */
  credentials: CredentialsOptions;

  /**
   * Event configuration for the built-in dispatcher.
   * Other dispatchers register at runtime through the EVENT_DISPATCHER provider.
   */
  events?: {
    enableLogging?: boolean;
    logLevel?: EventLogLevel;
    handlers?: Array<{
      eventType: string;
      handler: EventHandler;
    }>;
  };

  /**
   * Lifecycle hooks
   */
  hooks?: LifecycleHooks;
}

/**
 * Async configuration factory
 */
export interface WebhookRelayModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
  useFactory: (
    ...args: any[]
  ) => Promise<WebhookRelayModuleConfig> | WebhookRelayModuleConfig;
}

/**
 * Default configuration values
 */
export const defaultWebhookRelayConfig: Required<Pick<WebhookRelayModuleConfig, 'events'>> = {
  events: {
    enableLogging: true,
    logLevel: 'normal',
    handlers: [],
  },
};

export function mergeWebhookRelayConfig(
  config: WebhookRelayModuleConfig,
): WebhookRelayModuleConfig {
  return {
    ...config,
    events: { ...defaultWebhookRelayConfig.events, ...config.events },
  };
}
