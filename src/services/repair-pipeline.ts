import { TASK_OPT_FIELDS, type AsanaTask, type AsanaTaskApi } from '../integrations/asana';
import { logger as rootLogger, type Logger } from '../logger/logger';
import { classifyRepairTask } from './repair-classifier';
import type { RepairWorkflowRunner, WorkflowResult } from './repair-workflow';

export type RepairPipelineDeps = {
  asana: AsanaTaskApi;
  workflow: RepairWorkflowRunner;
  projectGid: string;
  logger?: Logger;
};

export type PipelineResult =
  | { kind: 'ignored'; taskGid: string; reason: 'outside-project' | 'not-a-repair-request' }
  | { kind: 'processed'; taskGid: string; result: WorkflowResult };

export async function runRepairPipelineForTask(deps: RepairPipelineDeps, task: AsanaTask): Promise<PipelineResult> {
  const log = deps.logger ?? rootLogger;

  const classification = classifyRepairTask(task, deps.projectGid);
  if (!classification.qualifies) {
    log.debug({ taskGid: task.gid, reason: classification.reason }, 'Task is not a repair request; ignoring');
    return { kind: 'ignored', taskGid: task.gid, reason: classification.reason };
  }

  const result = await deps.workflow.process(task);
  return { kind: 'processed', taskGid: task.gid, result };
}

// Always re-fetches: webhook deliveries carry only the gid, and the same gid may arrive more than once.
export async function runRepairPipeline(deps: RepairPipelineDeps, taskGid: string): Promise<PipelineResult> {
  const task = await deps.asana.getTask(taskGid, TASK_OPT_FIELDS);
  return runRepairPipelineForTask(deps, task);
}
