import type { Request, RequestHandler, Response } from 'express';

import { incWebhookReceived, incWebhookUnauthorized } from '../metrics/metrics';
import { runRepairPipeline, type RepairPipelineDeps } from '../services/repair-pipeline';
import { HOOK_SECRET_HEADER, verifyAsanaWebhook } from './asana';
import { isTaskAddedEvent, MalformedPayloadError, parseAsanaEvent, parseAsanaWebhookBody } from './asana-events';
import type { WebhookSecretStore } from './webhook-secret-store';

export type AsanaWebhookHandlerDeps = {
  secrets: WebhookSecretStore;
  pipeline: RepairPipelineDeps;
};

export type DeliverySummary = {
  received: number;
  processed: number;
  ignored: number;
  failed: number;
};

function rawBodyOf(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

async function dispatchEvents(req: Request, deps: AsanaWebhookHandlerDeps, events: unknown[]): Promise<DeliverySummary> {
  const summary: DeliverySummary = { received: events.length, processed: 0, ignored: 0, failed: 0 };

  // One event at a time; the response waits for all of them.
  for (const [index, raw] of events.entries()) {
    const e = parseAsanaEvent(raw);
    if (!e) {
      summary.ignored++;
      req.log.warn({ index }, 'Ignoring Asana event with unexpected shape');
      continue;
    }

    const taskGid = e.resource?.gid;
    if (!taskGid || !isTaskAddedEvent(e)) {
      summary.ignored++;
      continue;
    }

    try {
      const result = await runRepairPipeline({ ...deps.pipeline, logger: req.log }, taskGid);
      if (result.kind === 'processed') summary.processed++;
      else summary.ignored++;
    } catch (err) {
      summary.failed++;
      req.log.error({ err, taskGid, action: e.action }, 'Failed to process Asana event');
    }
  }

  return summary;
}

async function handleDelivery(req: Request, res: Response, deps: AsanaWebhookHandlerDeps): Promise<void> {
  const verified = verifyAsanaWebhook({ header: (name) => req.header(name), rawBody: rawBodyOf(req) }, deps.secrets);

  if (verified.kind === 'handshake') {
    incWebhookReceived('handshake');
    req.log.info('Asana webhook handshake received; secret stored');
    res.setHeader(HOOK_SECRET_HEADER, verified.secret);
    res.status(200).end();
    return;
  }

  if (req.method === 'GET') {
    res.status(200).type('text/plain').send('Webhook endpoint is accessible');
    return;
  }

  if (req.method !== 'POST') {
    res.setHeader('Allow', 'GET, POST');
    res.status(405).send('Method Not Allowed');
    return;
  }

  if (verified.kind === 'unauthorized') {
    incWebhookUnauthorized();
    req.log.warn({ reason: verified.reason }, 'Asana webhook unauthorized');
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  if (!verified.authenticated) {
    req.log.warn('Accepting unsigned Asana delivery: no handshake secret established yet');
  }

  let events: unknown[];
  try {
    events = parseAsanaWebhookBody(verified.rawBody).events;
  } catch (err) {
    if (!(err instanceof MalformedPayloadError)) throw err;
    req.log.error({ err }, 'Malformed Asana webhook payload');
    res.status(500).json({ error: 'Malformed payload' });
    return;
  }

  incWebhookReceived('delivery');
  const summary = await dispatchEvents(req, deps, events);
  req.log.info(summary, 'Asana webhook delivery handled');
  res.status(200).json({ status: 'received', ...summary });
}

export function asanaWebhookHandler(deps: AsanaWebhookHandlerDeps): RequestHandler {
  return (req, res, next) => {
    handleDelivery(req, res, deps).catch(next);
  };
}
