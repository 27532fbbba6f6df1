/**
 * Parsed JSON object carried by a webhook
 */
export type WebhookPayload = Record<string, unknown>;

/**
 * WebhookEvent domain model - an authenticated, decoded CI webhook
 *
 * Only ever built after the request signature has been verified against the
 * configured secret. Ownership passes to the event dispatcher.
 */
export class WebhookEvent {
  constructor(
    public readonly type: string,
    public readonly payload: WebhookPayload,
    public readonly deliveryId: string,
    public readonly receivedAt: Date = new Date(),
  ) {}

  /**
   * The `action` field most CI events carry (e.g. `completed` on workflow_run)
   */
  get action(): string | undefined {
    const action = this.payload.action;
    return typeof action === 'string' ? action : undefined;
  }

  /**
   * Event name qualified by action, e.g. `workflow_run.completed`
   */
  get qualifiedType(): string {
    const action = this.action;
    return action ? `${this.type}.${action}` : this.type;
  }
}
