import type { Server } from 'node:http';

import { request } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createApp } from '../src/app';
import { RepairWorkflow } from '../src/services/repair-workflow';
import { WebhookSecretStore } from '../src/webhooks/webhook-secret-store';
import { FakeAsana, FakeMailer, PROJECT_GID, close, listen, makeTask, plumbingEmergencyTask } from './helpers/fakes';

describe('operator routes', () => {
  let asana: FakeAsana;
  let mailer: FakeMailer;
  let server: Server;
  let baseUrl: string;

  async function start(publicBaseUrl: string | null) {
    const workflow = new RepairWorkflow({
      asana,
      mailer,
      subtasksProjectGid: PROJECT_GID,
      emailFrom: 'repairs@example.com',
      distributionList: ['maintenance@example.com'],
    });
    const app = createApp({
      secrets: new WebhookSecretStore(),
      pipeline: { asana, workflow, projectGid: PROJECT_GID },
      webhooks: asana,
      mailer,
      emailFrom: 'repairs@example.com',
      distributionList: ['maintenance@example.com'],
      publicBaseUrl,
      metricsToken: 'test-metrics-token',
    });
    ({ server, baseUrl } = await listen(app));
  }

  async function call(method: 'GET' | 'POST', path: string, headers: Record<string, string> = {}) {
    const res = await request(`${baseUrl}${path}`, { method, headers });
    return { status: res.statusCode, text: await res.body.text() };
  }

  beforeEach(async () => {
    asana = new FakeAsana();
    mailer = new FakeMailer();
    await start('https://repairs.example.com/');
  });

  afterEach(async () => {
    await close(server);
  });

  it('reports health', async () => {
    const res = await call('GET', '/health');
    expect(res.status).toBe(200);
    expect(JSON.parse(res.text).status).toBe('healthy');
  });

  it('registers the webhook for the configured project', async () => {
    const res = await call('POST', '/setup');
    expect(res.status).toBe(200);
    expect(JSON.parse(res.text)).toEqual({
      status: 'success',
      webhookGid: 'W1',
      targetUrl: 'https://repairs.example.com/webhook',
    });
    expect(asana.webhooks).toEqual([{ resourceGid: PROJECT_GID, targetUrl: 'https://repairs.example.com/webhook' }]);
  });

  it('refuses setup without a public base URL', async () => {
    await close(server);
    await start(null);
    const res = await call('POST', '/setup');
    expect(res.status).toBe(400);
    expect(asana.webhooks).toEqual([]);
  });

  it('processes a specific task and reports an already-processed one', async () => {
    asana.addTask(plumbingEmergencyTask('T1'));

    const first = await call('POST', '/process-task/T1');
    expect(first.status).toBe(200);
    expect(JSON.parse(first.text)).toMatchObject({ taskGid: 'T1', status: 'success', outcome: 'succeeded' });

    const again = await call('POST', '/process-task/T1');
    expect(JSON.parse(again.text)).toMatchObject({ taskGid: 'T1', status: 'success', outcome: 'skipped' });
    expect(mailer.sent).toHaveLength(1);
  });

  it('returns 400 for a task that is not a repair request', async () => {
    asana.addTask(makeTask({ gid: 'T2', name: 'Team lunch', notes: '' }));
    const res = await call('POST', '/process-task/T2');
    expect(res.status).toBe(400);
    expect(JSON.parse(res.text)).toMatchObject({ reason: 'not-a-repair-request' });
  });

  it('returns 500 when processing partially fails', async () => {
    asana.addTask(plumbingEmergencyTask('T3'));
    mailer.succeed = false;
    const res = await call('POST', '/process-task/T3');
    expect(res.status).toBe(500);
    expect(JSON.parse(res.text)).toMatchObject({ outcome: 'partially-failed', markerWritten: true });
  });

  it('processes tasks modified in the last day', async () => {
    asana.addTask(plumbingEmergencyTask('T1'));
    asana.addTask(makeTask({ gid: 'T2', name: 'Team lunch' }));

    const res = await call('POST', '/process-recent');

    expect(res.status).toBe(200);
    expect(JSON.parse(res.text)).toMatchObject({
      status: 'success',
      scanned: 2,
      succeeded: 1,
      partiallyFailed: 0,
      skipped: 0,
      ignored: 1,
      failed: 0,
    });
    expect(asana.listTasksCalls).toHaveLength(1);
    expect(asana.listTasksCalls[0].projectGid).toBe(PROJECT_GID);
  });

  it('sends a test email', async () => {
    const res = await call('POST', '/test-email');
    expect(res.status).toBe(200);
    expect(mailer.sent[0].subject).toBe('[TEST] New Repair Request: Plumbing - 123 Test Street');

    mailer.succeed = false;
    expect((await call('POST', '/test-email')).status).toBe(500);
  });

  it('guards metrics with the configured token', async () => {
    expect((await call('GET', '/metrics')).status).toBe(401);
    const res = await call('GET', '/metrics', { Authorization: 'Bearer test-metrics-token' });
    expect(res.status).toBe(200);
    expect(res.text).toContain('# TYPE repair_intake_workflow_runs_total counter');
  });
});
