/**
 * Webhook Relay NestJS Module
 */

// Main module
export { WebhookRelayModule } from './webhook-relay.module';

// Configuration
export {
  defaultWebhookRelayConfig,
  mergeWebhookRelayConfig,
} from './webhook-relay.config';
export type {
  WebhookRelayModuleConfig,
  WebhookRelayModuleAsyncConfig,
} from './webhook-relay.config';

// Controllers
export { WebhookController, HealthController } from './controllers';

// Injection tokens
export * from './constants';
