import type { AsanaComment } from '../integrations/asana';

// The marker is a plain Asana comment; this module is the only place that knows its text layout.

export type MarkerStatus = 'succeeded' | 'partially-failed';

export type MarkerSteps = {
  renamed: boolean;
  subtasksCreated: boolean;
  emailSent: boolean;
};

export type ProcessingMarker = {
  status: MarkerStatus;
  steps: MarkerSteps;
};

const MARKER_TAG = '[repair-intake]';
const HEADER_RE = /^\[repair-intake\] Repair request processed \(status: (succeeded|partially-failed)\)$/;

const STEP_LABELS: ReadonlyArray<[keyof MarkerSteps, string]> = [
  ['renamed', 'Task renamed'],
  ['subtasksCreated', 'Subtasks created'],
  ['emailSent', 'Notification email sent'],
];

function flag(ok: boolean): string {
  return ok ? '✅' : '❌';
}

export function formatProcessingMarker(marker: ProcessingMarker, processedAt: Date = new Date()): string {
  return [
    `${MARKER_TAG} Repair request processed (status: ${marker.status})`,
    ...STEP_LABELS.map(([key, label]) => `${flag(marker.steps[key])} ${label}`),
    `Processed at ${processedAt.toISOString()}`,
  ].join('\n');
}

export function parseProcessingMarker(text: string): ProcessingMarker | null {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  const header = lines[0]?.match(HEADER_RE);
  if (!header) return null;

  const status: MarkerStatus = header[1] === 'succeeded' ? 'succeeded' : 'partially-failed';
  const steps: MarkerSteps = { renamed: false, subtasksCreated: false, emailSent: false };
  for (const [key, label] of STEP_LABELS) {
    steps[key] = lines.includes(`✅ ${label}`);
  }

  return { status, steps };
}

// Only a succeeded marker settles a task; a partially-failed run is retried on the next delivery.
export function hasSuccessfulMarker(comments: readonly AsanaComment[]): boolean {
  return comments.some((c) => parseProcessingMarker(c.text)?.status === 'succeeded');
}
