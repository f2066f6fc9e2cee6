import type { Request } from 'express';

import type { WorkflowOutcome } from '../services/repair-workflow';

type Labels = Record<string, string>;

const counters = new Map<string, number>();

function seriesKey(name: string, labels?: Labels): string {
  if (!labels || Object.keys(labels).length === 0) return name;
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}="${String(labels[k]).replaceAll('\\', '\\\\').replaceAll('"', '\\"')}"`);
  return `${name}{${parts.join(',')}}`;
}

function incCounter(name: string, labels?: Labels, n = 1): void {
  const k = seriesKey(name, labels);
  counters.set(k, (counters.get(k) ?? 0) + n);
}

export function incWebhookReceived(kind: 'handshake' | 'delivery'): void {
  incCounter('repair_intake_webhooks_received_total', { kind });
}

export function incWebhookUnauthorized(): void {
  incCounter('repair_intake_webhooks_unauthorized_total');
}

export function incExternalApiError(provider: 'asana' | 'smtp', statusCode?: number): void {
  incCounter('repair_intake_external_api_errors_total', {
    provider,
    ...(statusCode !== undefined ? { status: String(statusCode) } : {}),
  });
}

export function incWorkflowOutcome(outcome: WorkflowOutcome): void {
  incCounter('repair_intake_workflow_runs_total', { outcome });
}

export function formatPrometheusText(lines: string[]): string {
  return lines.join('\n') + (lines.length ? '\n' : '');
}

function renderCounters(): string[] {
  const out: string[] = [];
  const byName = new Map<string, string[]>();

  for (const [k, v] of counters.entries()) {
    const name = k.split('{')[0];
    const arr = byName.get(name) ?? [];
    arr.push(`${k} ${v}`);
    byName.set(name, arr);
  }

  const specs: Array<{ name: string; help: string }> = [
    { name: 'repair_intake_webhooks_received_total', help: 'Webhook requests accepted total' },
    { name: 'repair_intake_webhooks_unauthorized_total', help: 'Webhooks rejected as unauthorized total' },
    { name: 'repair_intake_external_api_errors_total', help: 'Failed calls to external services total' },
    { name: 'repair_intake_workflow_runs_total', help: 'Repair workflow runs by outcome' },
  ];

  for (const s of specs) {
    out.push(`# HELP ${s.name} ${s.help}`);
    out.push(`# TYPE ${s.name} counter`);
    const series = byName.get(s.name) ?? [];
    if (!series.length) {
      out.push(`${s.name} 0`);
      continue;
    }
    out.push(...series.sort());
  }

  return out;
}

export function isMetricsRequestAllowed(req: Request, token: string | undefined): boolean {
  if (token && token.trim()) {
    const auth = String(req.header('authorization') ?? '');
    const m = auth.match(/^Bearer\s+(.+)$/i);
    return Boolean(m && m[1].trim() === token.trim());
  }

  // Default: allow only local access.
  const ip = req.ip ?? '';
  return ip === '127.0.0.1' || ip === '::1' || ip === '::ffff:127.0.0.1';
}

export function getMetricsText(): string {
  return formatPrometheusText(renderCounters());
}
