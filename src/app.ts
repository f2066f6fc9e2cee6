import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import pinoHttp from 'pino-http';

import type { AsanaWebhookApi } from './integrations/asana';
import type { Mailer } from './integrations/mailer';
import { logger } from './logger/logger';
import { getMetricsText, isMetricsRequestAllowed } from './metrics/metrics';
import { operatorRouter } from './routes/operator';
import type { RepairPipelineDeps } from './services/repair-pipeline';
import { asanaWebhookHandler } from './webhooks/asana-handler';
import type { WebhookSecretStore } from './webhooks/webhook-secret-store';

export type AppDeps = {
  secrets: WebhookSecretStore;
  pipeline: RepairPipelineDeps;
  webhooks: AsanaWebhookApi | null;
  mailer: Mailer;
  emailFrom: string;
  distributionList: string[];
  publicBaseUrl: string | null;
  metricsToken?: string;
};

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(
    pinoHttp({
      logger,
      redact: {
        paths: ['req.headers.authorization', 'req.headers["x-hook-secret"]'],
        remove: true,
      },
    }),
  );

  // Raw bytes: signatures cover the exact body, and handshakes may carry non-JSON bodies.
  app.all(
    '/webhook',
    express.raw({ type: () => true, limit: '1mb' }),
    asanaWebhookHandler({ secrets: deps.secrets, pipeline: deps.pipeline }),
  );

  app.use(express.json({ limit: '1mb' }));

  app.get('/metrics', (req: Request, res: Response) => {
    if (!isMetricsRequestAllowed(req, deps.metricsToken)) {
      res.status(401).send('Unauthorized');
      return;
    }
    res.status(200).setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8').send(getMetricsText());
  });

  app.use(
    operatorRouter({
      pipeline: deps.pipeline,
      webhooks: deps.webhooks,
      mailer: deps.mailer,
      emailFrom: deps.emailFrom,
      distributionList: deps.distributionList,
      publicBaseUrl: deps.publicBaseUrl,
    }),
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    req.log.error({ err }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}
