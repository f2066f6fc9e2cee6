import { beforeEach, describe, expect, it, vi } from 'vitest';

import { logger } from '../src/logger/logger';
import { formatProcessingMarker, parseProcessingMarker } from '../src/services/processing-marker';
import { RepairWorkflow, repairTaskTitle } from '../src/services/repair-workflow';
import { FakeAsana, FakeMailer, plumbingEmergencyTask } from './helpers/fakes';

const SUBTASKS_PROJECT_GID = '1200000000000002';

describe('RepairWorkflow', () => {
  let asana: FakeAsana;
  let mailer: FakeMailer;
  let workflow: RepairWorkflow;

  beforeEach(() => {
    asana = new FakeAsana();
    mailer = new FakeMailer();
    workflow = new RepairWorkflow({
      asana,
      mailer,
      subtasksProjectGid: SUBTASKS_PROJECT_GID,
      emailFrom: 'repairs@example.com',
      distributionList: ['maintenance@example.com'],
      logger,
    });
  });

  it('creates the emergency plumbing checklist, renames, notifies and marks the task', async () => {
    const result = await workflow.process(plumbingEmergencyTask('T1'));

    expect(result.outcome).toBe('succeeded');
    expect(asana.renames).toEqual([{ taskGid: 'T1', name: '🚿 Plumbing - Unknown' }]);
    expect(asana.subtasks.map((s) => s.name)).toEqual([
      'Assess issue and document damage',
      'Immediate safety check',
      'Escalate to emergency maintenance contact',
      'Contact tenant to confirm details',
      'Schedule repair visit',
      'Shut off water supply if leaking',
      'Inspect pipes and fixtures',
      'Check for water damage',
      'Procure parts and materials',
      'Complete repair work',
      'Verify repair quality',
      'Follow up with tenant',
    ]);
    expect(asana.subtasks.every((s) => s.parentGid === 'T1' && s.projects[0] === SUBTASKS_PROJECT_GID)).toBe(true);

    expect(mailer.sent).toHaveLength(1);
    expect(mailer.sent[0].subject).toBe('URGENT: New Repair Request: Plumbing - Unknown');
    expect(mailer.sent[0].to).toEqual(['maintenance@example.com']);
    expect(mailer.sent[0].from).toBe('repairs@example.com');

    const comments = asana.comments.get('T1') ?? [];
    expect(comments).toHaveLength(1);
    expect(comments[0].text.match(/[✅❌]/gu)).toHaveLength(3);
    expect(parseProcessingMarker(comments[0].text)).toEqual({
      status: 'succeeded',
      steps: { renamed: true, subtasksCreated: true, emailSent: true },
    });
  });

  it('skips a task that already carries a marker without further side effects', async () => {
    const task = plumbingEmergencyTask('T1');
    await workflow.process(task);

    const subtaskSpy = vi.spyOn(asana, 'createSubtask');
    const sendSpy = vi.spyOn(mailer, 'send');

    const second = await workflow.process(task);

    expect(second).toEqual({ outcome: 'skipped', taskGid: 'T1' });
    expect(subtaskSpy).not.toHaveBeenCalled();
    expect(sendSpy).not.toHaveBeenCalled();
    expect(asana.comments.get('T1')).toHaveLength(1);
  });

  it('runs again on a task whose only marker records a partial failure', async () => {
    const partial = formatProcessingMarker({
      status: 'partially-failed',
      steps: { renamed: true, subtasksCreated: true, emailSent: false },
    });
    await asana.createComment('T9', { text: partial });

    const result = await workflow.process(plumbingEmergencyTask('T9'));

    expect(result.outcome).toBe('succeeded');
    expect(mailer.sent).toHaveLength(1);
    expect(asana.subtasks).toHaveLength(12);
    expect(asana.comments.get('T9')).toHaveLength(2);

    const again = await workflow.process(plumbingEmergencyTask('T9'));
    expect(again).toEqual({ outcome: 'skipped', taskGid: 'T9' });
    expect(mailer.sent).toHaveLength(1);
  });

  it('keeps creating subtasks after one fails and reports a partial failure', async () => {
    asana.failOn.createSubtask = (name) => name === 'Schedule repair visit';

    const result = await workflow.process(plumbingEmergencyTask('T2'));

    expect(result.outcome).toBe('partially-failed');
    if (result.outcome === 'skipped') throw new Error('unexpected skip');
    expect(result.subtasks).toEqual({ created: 11, total: 12 });
    expect(result.steps).toEqual({ renamed: true, subtasksCreated: false, emailSent: true });
    expect(mailer.sent).toHaveLength(1);
    expect(result.markerWritten).toBe(true);
  });

  it('reports a failed email without throwing', async () => {
    mailer.succeed = false;

    const result = await workflow.process(plumbingEmergencyTask('T3'));

    expect(result.outcome).toBe('partially-failed');
    const marker = parseProcessingMarker(asana.comments.get('T3')?.[0]?.text ?? '');
    expect(marker?.steps).toEqual({ renamed: true, subtasksCreated: true, emailSent: false });
  });

  it('continues when the rename fails and still succeeds overall', async () => {
    asana.failOn.updateTask = true;

    const result = await workflow.process(plumbingEmergencyTask('T4'));

    expect(result.outcome).toBe('succeeded');
    if (result.outcome === 'skipped') throw new Error('unexpected skip');
    expect(result.steps.renamed).toBe(false);
    expect(asana.subtasks).toHaveLength(12);
  });

  it('leaves the task unprocessed when the marker cannot be written', async () => {
    asana.failOn.createComment = true;
    const task = plumbingEmergencyTask('T5');

    const first = await workflow.process(task);
    expect(first.outcome).toBe('succeeded');
    if (first.outcome === 'skipped') throw new Error('unexpected skip');
    expect(first.markerWritten).toBe(false);

    asana.failOn.createComment = false;
    const second = await workflow.process(task);
    expect(second.outcome).toBe('succeeded');
    expect(mailer.sent).toHaveLength(2);
  });

  it('proceeds when existing comments cannot be listed', async () => {
    asana.failOn.listComments = true;
    const result = await workflow.process(plumbingEmergencyTask('T6'));
    expect(result.outcome).toBe('succeeded');
  });

  it('runs concurrent deliveries for the same task only once', async () => {
    const task = plumbingEmergencyTask('T7');

    const [a, b] = await Promise.all([workflow.process(task), workflow.process(task)]);

    expect(a).toBe(b);
    expect(asana.subtasks).toHaveLength(12);
    expect(mailer.sent).toHaveLength(1);
  });

  it('titles the task with the category tag and address', () => {
    expect(repairTaskTitle({ category: 'HVAC', address: '9 Pine Ave' })).toBe('❄️ HVAC - 9 Pine Ave');
    expect(repairTaskTitle({ category: 'Roofing', address: 'Unknown' })).toBe('🔧 Roofing - Unknown');
  });
});
