/**
 * Webhook processing outcomes - every request ends in exactly one of these
 */
export enum ProcessingStatus {
  /**
   * Signature verified, payload decoded and event handed to the dispatcher
   */
  ACCEPTED = 'accepted',

  /**
   * No webhook secret configured on this server
   */
  MISCONFIGURED = 'misconfigured',

  /**
   * Request carried no signature header
   */
  MISSING_SIGNATURE = 'missing_signature',

  /**
   * Declared or streamed body larger than the cap
   */
  OVERSIZE_BODY = 'oversize_body',

  /**
   * Body stream aborted or did not match the declared length
   */
  BODY_READ_FAILED = 'body_read_failed',

  /**
   * Signature unsupported, malformed or not matching the body
   */
  SIGNATURE_FAILED = 'signature_failed',

  /**
   * Authenticated request without an event name header
   */
  MISSING_EVENT_TYPE = 'missing_event_type',

  /**
   * Authenticated request whose body is not a JSON object
   */
  PARSE_ERROR = 'parse_error',

  /**
   * A stage failed inside the server: HMAC unavailable or dispatch refused
   */
  INTERNAL_ERROR = 'internal_error',
}
