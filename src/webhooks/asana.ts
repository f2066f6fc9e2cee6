import crypto from 'node:crypto';

import type { WebhookSecretStore } from './webhook-secret-store';

export const HOOK_SECRET_HEADER = 'X-Hook-Secret';
export const HOOK_SIGNATURE_HEADER = 'X-Hook-Signature';

export type AsanaWebhookRequest = {
  header(name: string): string | undefined;
  rawBody: Buffer;
};

export type AsanaWebhookResult =
  | { kind: 'handshake'; secret: string }
  | { kind: 'event'; rawBody: Buffer; authenticated: boolean }
  | { kind: 'unauthorized'; reason: string };

export function signAsanaPayload(secret: string, rawBody: Buffer | string): string {
  return crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
}

export function timingSafeEqualHex(aHex: string, bHex: string): boolean {
  const a = Buffer.from(aHex, 'utf8');
  const b = Buffer.from(bHex, 'utf8');
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

/**
 * Handshake wins over everything else: any request carrying X-Hook-Secret re-arms the store.
 * While unarmed, unsigned deliveries are let through unauthenticated (bootstrap window).
 */
export function verifyAsanaWebhook(req: AsanaWebhookRequest, secrets: WebhookSecretStore): AsanaWebhookResult {
  const hookSecretHeader = req.header(HOOK_SECRET_HEADER);
  if (hookSecretHeader !== undefined) {
    secrets.arm(hookSecretHeader);
    return { kind: 'handshake', secret: hookSecretHeader };
  }

  const signature = req.header(HOOK_SIGNATURE_HEADER);
  const state = secrets.current();

  if (state.state === 'unarmed') {
    if (signature) return { kind: 'unauthorized', reason: 'signature present but no webhook secret established' };
    return { kind: 'event', rawBody: req.rawBody, authenticated: false };
  }

  if (!signature) return { kind: 'unauthorized', reason: 'missing x-hook-signature' };

  const expected = signAsanaPayload(state.secret, req.rawBody);
  if (!timingSafeEqualHex(signature, expected)) {
    return { kind: 'unauthorized', reason: 'invalid signature' };
  }

  return { kind: 'event', rawBody: req.rawBody, authenticated: true };
}
