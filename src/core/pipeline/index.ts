/**
 * Webhook processing pipeline
 *
 * 1. Gate - refuse misconfigured, unsigned or oversize requests
 * 2. Read body - raw bytes, bounded
 * 3. Verification - HMAC-SHA256 signature
 * 4. Decode - event name and JSON payload
 * 5. Dispatch - emit the event
 */

// Main processor
export { WebhookProcessor } from './webhook-processor';

// Pipeline types and constants
export * from './types';
export * from './constants';

// Individual stages (for testing or custom pipelines)
export { GateStage, classifyRequest } from './stages/gate.stage';
export type { GateDecision } from './stages/gate.stage';
export { ReadBodyStage } from './stages/read-body.stage';
export { VerificationStage } from './stages/verification.stage';
export { DecodeStage } from './stages/decode.stage';
export { DispatchStage } from './stages/dispatch.stage';
