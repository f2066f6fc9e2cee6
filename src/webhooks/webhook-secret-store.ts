export type WebhookSecretState = { state: 'unarmed' } | { state: 'armed'; secret: string };

/**
 * Holds the shared secret negotiated by the most recent Asana handshake.
 * Lives in memory only: a restart returns to `unarmed` until the next handshake.
 * Reads and writes are single synchronous steps, so concurrent requests on the
 * event loop always observe a whole value.
 */
export class WebhookSecretStore {
  private secret: string | null = null;

  arm(secret: string): void {
    this.secret = secret;
  }

  current(): WebhookSecretState {
    return this.secret === null ? { state: 'unarmed' } : { state: 'armed', secret: this.secret };
  }
}
