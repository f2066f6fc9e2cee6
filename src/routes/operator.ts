import { Router, type Request, type Response } from 'express';

import type { AsanaWebhookApi } from '../integrations/asana';
import type { Mailer } from '../integrations/mailer';
import { buildRepairNotification } from '../services/notification-email';
import type { RepairRequestDetails } from '../services/repair-details';
import {
  runRepairPipeline,
  runRepairPipelineForTask,
  type PipelineResult,
  type RepairPipelineDeps,
} from '../services/repair-pipeline';

export type OperatorRouterDeps = {
  pipeline: RepairPipelineDeps;
  webhooks: AsanaWebhookApi | null;
  mailer: Mailer;
  emailFrom: string;
  distributionList: string[];
  publicBaseUrl: string | null;
  now?: () => Date;
};

const RECENT_WINDOW_MS = 24 * 60 * 60 * 1000;

export const SAMPLE_REPAIR_DETAILS: RepairRequestDetails = {
  firstName: 'Test',
  lastName: 'Tenant',
  email: 'tenant@example.com',
  phone: '(555) 123-4567',
  address: '123 Test Street',
  unitNumber: 'Apt 4B',
  category: 'Plumbing',
  urgency: 'Standard',
  specificIssue: 'Leaky faucet',
  description: 'Sample repair request used to check email delivery.',
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describePipelineResult(result: PipelineResult): { status: number; body: Record<string, unknown> } {
  if (result.kind === 'ignored') {
    return {
      status: 400,
      body: { status: 'error', message: `Task ${result.taskGid} is not a repair request task`, reason: result.reason },
    };
  }

  const r = result.result;
  if (r.outcome === 'partially-failed') {
    return {
      status: 500,
      body: { status: 'error', outcome: r.outcome, steps: r.steps, subtasks: r.subtasks, markerWritten: r.markerWritten },
    };
  }
  if (r.outcome === 'skipped') {
    return { status: 200, body: { status: 'success', outcome: r.outcome, message: `Task ${r.taskGid} was already processed` } };
  }
  return {
    status: 200,
    body: { status: 'success', outcome: r.outcome, steps: r.steps, subtasks: r.subtasks, markerWritten: r.markerWritten },
  };
}

export function operatorRouter(deps: OperatorRouterDeps): Router {
  const r = Router();
  const now = deps.now ?? (() => new Date());

  r.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', timestamp: now().toISOString() });
  });

  r.post('/setup', async (req: Request, res: Response) => {
    if (!deps.webhooks || !deps.publicBaseUrl) {
      res.status(400).json({ status: 'error', message: 'ASANA_PAT and PUBLIC_BASE_URL must be configured' });
      return;
    }

    const targetUrl = `${deps.publicBaseUrl.replace(/\/+$/, '')}/webhook`;
    try {
      const created = await deps.webhooks.createWebhook({
        resourceGid: deps.pipeline.projectGid,
        targetUrl,
        filters: [{ resource_type: 'task', action: 'added' }],
      });
      req.log.info({ webhookGid: created.webhookGid, targetUrl }, 'Asana webhook registered');
      res.status(200).json({ status: 'success', webhookGid: created.webhookGid, targetUrl });
    } catch (err) {
      req.log.error({ err, targetUrl }, 'Failed to register Asana webhook');
      res.status(500).json({ status: 'error', message: `Failed to setup: ${errorMessage(err)}` });
    }
  });

  r.post('/process-task/:gid', async (req: Request, res: Response) => {
    const taskGid = String(req.params.gid);
    try {
      const result = await runRepairPipeline({ ...deps.pipeline, logger: req.log }, taskGid);
      const { status, body } = describePipelineResult(result);
      res.status(status).json({ taskGid, ...body });
    } catch (err) {
      req.log.error({ err, taskGid }, 'Manual task processing failed');
      res.status(500).json({ taskGid, status: 'error', message: errorMessage(err) });
    }
  });

  r.post('/process-recent', async (req: Request, res: Response) => {
    const since = new Date(now().getTime() - RECENT_WINDOW_MS);
    try {
      const tasks = await deps.pipeline.asana.listTasks(deps.pipeline.projectGid, since);
      const counts = { scanned: tasks.length, succeeded: 0, partiallyFailed: 0, skipped: 0, ignored: 0, failed: 0 };

      for (const task of tasks) {
        try {
          const result = await runRepairPipelineForTask({ ...deps.pipeline, logger: req.log }, task);
          if (result.kind === 'ignored') counts.ignored++;
          else if (result.result.outcome === 'succeeded') counts.succeeded++;
          else if (result.result.outcome === 'skipped') counts.skipped++;
          else counts.partiallyFailed++;
        } catch (err) {
          counts.failed++;
          req.log.error({ err, taskGid: task.gid }, 'Failed to process recent task');
        }
      }

      res.status(200).json({ status: 'success', since: since.toISOString(), ...counts });
    } catch (err) {
      req.log.error({ err }, 'Failed to list recent tasks');
      res.status(500).json({ status: 'error', message: errorMessage(err) });
    }
  });

  r.post('/test-email', async (req: Request, res: Response) => {
    const content = buildRepairNotification(SAMPLE_REPAIR_DETAILS, 'sample-task');
    const sent = await deps.mailer.send({
      from: deps.emailFrom,
      to: deps.distributionList,
      subject: `[TEST] ${content.subject}`,
      html: content.html,
    });
    if (!sent) {
      req.log.warn('Test email was not sent');
      res.status(500).json({ status: 'error', message: 'Failed to send test email' });
      return;
    }
    res.status(200).json({ status: 'success', message: 'Test email sent successfully' });
  });

  return r;
}
