import * as fs from 'fs';
import { Logger } from '@nestjs/common';
import { Credentials } from '../interfaces';

export interface CredentialsOptions {
  /**
   * Inline webhook secret
   */
  webhookSecret?: string;

  /**
   * File holding the webhook secret; takes precedence over `webhookSecret`
   * and is re-read by `reload()`
   */
  secretFile?: string;
}

/**
 * In-memory holder for the shared webhook secret
 *
 * The secret is a single string reference that is replaced wholesale, so
 * concurrent readers always see either the previous or the next value.
 */
export class WebhookCredentials implements Credentials {
  private readonly logger = new Logger(WebhookCredentials.name);
  private secret: string | undefined;

  constructor(private readonly options: CredentialsOptions = {}) {
    this.secret = normalizeSecret(options.webhookSecret);
  }

  getWebhookSecret(): string | undefined {
    return this.secret;
  }

  isConfigured(): boolean {
    return this.secret !== undefined;
  }

  /**
   * Replace the active secret. An empty value unconfigures the server.
   */
  rotate(secret: string | undefined): void {
    const next = normalizeSecret(secret);
    if (next === this.secret) {
      return;
    }

    this.secret = next;
    if (next === undefined) {
      this.logger.warn('webhook-secret cleared; requests will be refused');
    } else {
      this.logger.log('webhook-secret rotated');
    }
  }

  /**
   * Re-read the secret file, if one is configured.
   * On failure the current secret stays active and the error is thrown.
   *
   * @returns whether the active secret changed
   */
  async reload(): Promise<boolean> {
    const { secretFile } = this.options;
    if (!secretFile) {
      return false;
    }

    let content: string;
    try {
      content = await fs.promises.readFile(secretFile, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new Error(`Secret file not found: ${secretFile}`);
      }
      throw error;
    }

    const previous = this.secret;
    this.rotate(content.replace(/\r?\n$/, ''));
    return previous !== this.secret;
  }
}

function normalizeSecret(secret: string | undefined): string | undefined {
  return secret && secret.length > 0 ? secret : undefined;
}
