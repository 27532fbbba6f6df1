/**
 * Injection tokens for the webhook relay module
 */

export const WEBHOOK_RELAY_CONFIG = Symbol('WEBHOOK_RELAY_CONFIG');
export const CREDENTIALS = Symbol('CREDENTIALS');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
