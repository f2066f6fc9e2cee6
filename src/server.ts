import dotenv from 'dotenv';

import { createApp } from './app';
import { getEnv, toAppConfig } from './config/env';
import { AsanaClient } from './integrations/asana';
import { SmtpMailer } from './integrations/mailer';
import { logger } from './logger/logger';
import { RepairWorkflow } from './services/repair-workflow';
import { WebhookSecretStore } from './webhooks/webhook-secret-store';

dotenv.config();

function requirePat(pat: string | null): string {
  if (!pat) throw new Error('ASANA_PAT is required');
  return pat;
}

async function main(): Promise<void> {
  const config = toAppConfig(getEnv());

  const asana = new AsanaClient(requirePat(config.asanaPat));
  const mailer = new SmtpMailer(config.smtp, logger);

  const workflow = new RepairWorkflow({
    asana,
    mailer,
    subtasksProjectGid: config.subtasksProjectGid,
    emailFrom: config.emailFrom,
    distributionList: config.distributionList,
  });

  const app = createApp({
    secrets: new WebhookSecretStore(),
    pipeline: { asana, workflow, projectGid: config.projectGid },
    webhooks: asana,
    mailer,
    emailFrom: config.emailFrom,
    distributionList: config.distributionList,
    publicBaseUrl: config.publicBaseUrl,
    metricsToken: config.metricsToken,
  });

  app.listen(config.port, () => {
    logger.info({ port: config.port, projectGid: config.projectGid }, 'Server listening');
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught exception');
  process.exit(1);
});

main().catch((err: unknown) => {
  logger.error({ err }, 'Fatal startup error');
  process.exit(1);
});
