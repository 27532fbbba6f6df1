/**
 * Event system
 * Dispatching of authenticated webhook events to in-process handlers
 */

// Event dispatcher implementations
export { EventDispatcherImpl } from './event-dispatcher.impl';
export { DynamicEventDispatcher } from './dynamic-event-dispatcher';
export type { DispatcherRegistration } from './dynamic-event-dispatcher';

// Built-in event handlers
export { LoggingEventHandler } from './handlers/logging.handler';
export type { EventLogLevel } from './handlers/logging.handler';
