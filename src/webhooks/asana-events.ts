import { z } from 'zod';

// Minimal schema for Asana webhook payload.
// Asana may send additional fields; we only validate what we use.
const asanaEventSchema = z.object({
  resource: z
    .object({
      gid: z.string(),
      resource_type: z.string().optional(),
      name: z.string().nullish(),
    })
    .optional(),
  action: z.string().optional(),
  parent: z
    .object({
      gid: z.string().optional(),
      resource_type: z.string().optional(),
    })
    .nullish(),
});

// Events are validated one at a time by parseAsanaEvent.
const asanaWebhookPayloadSchema = z.object({
  events: z.array(z.unknown()).default([]),
});

export type AsanaEvent = z.infer<typeof asanaEventSchema>;
export type AsanaWebhookPayload = z.infer<typeof asanaWebhookPayloadSchema>;

export class MalformedPayloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedPayloadError';
  }
}

export function parseAsanaWebhookPayload(payload: unknown): AsanaWebhookPayload {
  const parsed = asanaWebhookPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedPayloadError(`Invalid Asana webhook payload: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function parseAsanaEvent(raw: unknown): AsanaEvent | null {
  const parsed = asanaEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function parseAsanaWebhookBody(rawBody: Buffer): AsanaWebhookPayload {
  const text = rawBody.toString('utf8');
  if (!text.trim()) return { events: [] };

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MalformedPayloadError('Asana webhook body is not valid JSON', { cause: err });
  }
  return parseAsanaWebhookPayload(json);
}

export function isTaskAddedEvent(e: AsanaEvent): boolean {
  return e.resource?.resource_type === 'task' && e.action === 'added';
}
