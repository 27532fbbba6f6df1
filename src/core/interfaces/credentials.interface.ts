/**
 * Source of the shared webhook secret
 *
 * Implementations may rotate the secret at any time; callers take one
 * snapshot per request and use it throughout.
 */
export interface Credentials {
  /**
   * Current secret, or undefined when none is configured
   */
  getWebhookSecret(): string | undefined;
}
