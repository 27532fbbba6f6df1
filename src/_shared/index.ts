/**
 * Shared Resources
 */

// Swagger decorators for clean controllers
export * from './swagger/decorators';

// Testing utilities
export * from './testing/signed-webhook-factory';
