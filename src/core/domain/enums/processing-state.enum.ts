/**
 * Pipeline states a request moves through, in order.
 * Any state may end early in REJECTED or FAILED.
 */
export enum ProcessingState {
  GATING = 'gating',
  READING = 'reading',
  VERIFYING = 'verifying',
  DECODING = 'decoding',
  DISPATCHING = 'dispatching',
  DONE = 'done',
  REJECTED = 'rejected',
  FAILED = 'failed',
}
