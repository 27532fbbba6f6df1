/**
 * CI Webhook Relay
 *
 * Authenticates CI provider webhooks by HMAC-SHA256 signature and forwards
 * them as typed events to an in-process dispatcher.
 */
import 'reflect-metadata';

// Export all core components
export * from './core';

// Export testing utilities from _shared
export {
  SignedWebhookFactory,
  InMemoryWebhookRequest,
} from './_shared';
export type {
  WebhookOptions,
  SignedWebhook,
} from './_shared';

// Export adapters
export * from './adapters/http';

// Export NestJS module, controllers and injection tokens
export * from './modules';

// Export environment validation
export { EnvironmentVariables, validateEnvironment } from './config/environment';
