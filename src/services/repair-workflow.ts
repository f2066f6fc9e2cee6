import type { AsanaTask, AsanaTaskApi } from '../integrations/asana';
import type { Mailer } from '../integrations/mailer';
import { logger as rootLogger, type Logger } from '../logger/logger';
import { incWorkflowOutcome } from '../metrics/metrics';
import { buildRepairNotification } from './notification-email';
import { formatProcessingMarker, hasSuccessfulMarker, type MarkerSteps } from './processing-marker';
import { buildChecklist, categoryTag } from './repair-catalog';
import { extractRepairDetails, type RepairRequestDetails } from './repair-details';
import { SingleFlight } from './single-flight';

export type WorkflowOutcome = 'skipped' | 'succeeded' | 'partially-failed';

export type WorkflowResult =
  | { outcome: 'skipped'; taskGid: string }
  | {
      outcome: 'succeeded' | 'partially-failed';
      taskGid: string;
      details: RepairRequestDetails;
      steps: MarkerSteps;
      subtasks: { created: number; total: number };
      markerWritten: boolean;
    };

export interface RepairWorkflowRunner {
  process(task: AsanaTask): Promise<WorkflowResult>;
}

export type RepairWorkflowDeps = {
  asana: AsanaTaskApi;
  mailer: Mailer;
  subtasksProjectGid: string;
  emailFrom: string;
  distributionList: string[];
  logger?: Logger;
};

export function repairTaskTitle(details: Pick<RepairRequestDetails, 'category' | 'address'>): string {
  return `${categoryTag(details.category)} ${details.category} - ${details.address}`;
}

/**
 * Runs the side effects for one qualifying repair request: rename, checklist subtasks,
 * notification email, then the processing marker comment.
 *
 * Each remote step is caught on its own and reported as a flag; nothing is retried here.
 * The marker comment is the commit point: until it is written the task counts as unprocessed.
 * Concurrent calls for the same task gid share a single run.
 */
export class RepairWorkflow implements RepairWorkflowRunner {
  private readonly log: Logger;
  private readonly inFlight = new SingleFlight<WorkflowResult>();

  constructor(private readonly deps: RepairWorkflowDeps) {
    this.log = deps.logger ?? rootLogger;
  }

  process(task: AsanaTask): Promise<WorkflowResult> {
    return this.inFlight.run(task.gid, () => this.run(task));
  }

  private async run(task: AsanaTask): Promise<WorkflowResult> {
    const log = this.log.child({ taskGid: task.gid });

    if (await this.isAlreadyProcessed(task.gid, log)) {
      log.info('Repair request already processed; skipping');
      incWorkflowOutcome('skipped');
      return { outcome: 'skipped', taskGid: task.gid };
    }

    const details = extractRepairDetails(task);
    log.info({ category: details.category, urgency: details.urgency }, 'Processing repair request');

    const renamed = await this.renameTask(task.gid, details, log);
    const subtasks = await this.createChecklist(task.gid, details, log);
    const emailSent = await this.sendNotification(task, details, log);

    const steps: MarkerSteps = {
      renamed,
      subtasksCreated: subtasks.created === subtasks.total,
      emailSent,
    };
    const outcome = steps.subtasksCreated && steps.emailSent ? 'succeeded' : 'partially-failed';
    const markerWritten = await this.writeMarker(task.gid, formatProcessingMarker({ status: outcome, steps }), log);

    incWorkflowOutcome(outcome);
    log.info({ outcome, steps, subtasks, markerWritten }, 'Repair request processed');

    return { outcome, taskGid: task.gid, details, steps, subtasks, markerWritten };
  }

  private async isAlreadyProcessed(taskGid: string, log: Logger): Promise<boolean> {
    try {
      const comments = await this.deps.asana.listComments(taskGid);
      return hasSuccessfulMarker(comments);
    } catch (err) {
      log.warn({ err }, 'Failed to list task comments; treating task as unprocessed');
      return false;
    }
  }

  private async renameTask(taskGid: string, details: RepairRequestDetails, log: Logger): Promise<boolean> {
    const name = repairTaskTitle(details);
    try {
      await this.deps.asana.updateTask(taskGid, { name });
      return true;
    } catch (err) {
      log.error({ err, name }, 'Failed to rename task');
      return false;
    }
  }

  private async createChecklist(
    taskGid: string,
    details: RepairRequestDetails,
    log: Logger,
  ): Promise<{ created: number; total: number }> {
    const checklist = buildChecklist(details.category, details.urgency);
    let created = 0;

    for (const name of checklist) {
      try {
        await this.deps.asana.createSubtask(taskGid, { name, projects: [this.deps.subtasksProjectGid] });
        created++;
      } catch (err) {
        log.error({ err, subtask: name }, 'Failed to create subtask');
      }
    }

    return { created, total: checklist.length };
  }

  private async sendNotification(task: AsanaTask, details: RepairRequestDetails, log: Logger): Promise<boolean> {
    const content = buildRepairNotification(details, task.gid, task.permalink_url);
    try {
      return await this.deps.mailer.send({
        from: this.deps.emailFrom,
        to: this.deps.distributionList,
        subject: content.subject,
        html: content.html,
      });
    } catch (err) {
      log.error({ err }, 'Mailer threw while sending notification');
      return false;
    }
  }

  private async writeMarker(taskGid: string, text: string, log: Logger): Promise<boolean> {
    try {
      await this.deps.asana.createComment(taskGid, { text });
      return true;
    } catch (err) {
      log.error({ err }, 'Failed to write processing marker; task will be retried on next delivery');
      return false;
    }
  }
}
