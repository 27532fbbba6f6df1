/**
 * Centralized Swagger decorators
 */

export * from './webhook.decorators';
export * from './health.decorators';
