/**
 * Core - webhook authentication and event translation
 * Framework-free apart from the shared logger
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Signature verification and payload decoding
export * from './verification';
export * from './decoding';

// Webhook processing pipeline
export * from './pipeline';

// Core services
export * from './services';

// Event system
export * from './events';
