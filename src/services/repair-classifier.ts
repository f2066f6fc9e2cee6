import type { AsanaTask } from '../integrations/asana';
import { extractField, hasFieldNamed } from './asana-fields';

export type TaskPredicate = (task: AsanaTask) => boolean;

export const REQUIRED_FORM_FIELDS = ['Issue Category', 'Urgency Level'] as const;

const CATEGORY_TOKENS = ['category', 'issue'] as const;
const URGENCY_TOKENS = ['urgency', 'priority'] as const;
const REPAIR_KEYWORDS = ['repair', 'fix', 'broken', 'not working', 'problem', 'maintenance'] as const;

export function isInProject(task: Pick<AsanaTask, 'projects'>, projectGid: string): boolean {
  return task.projects.includes(projectGid);
}

export function hasRequiredFields(required: readonly string[] = REQUIRED_FORM_FIELDS): TaskPredicate {
  return (task) => required.every((name) => extractField(task, name) !== null);
}

export const looksLikeRepairForm: TaskPredicate = (task) =>
  hasFieldNamed(task, CATEGORY_TOKENS) && hasFieldNamed(task, URGENCY_TOKENS);

export const mentionsRepairKeyword: TaskPredicate = (task) => {
  const text = `${task.name}\n${task.notes ?? ''}`.toLowerCase();
  return REPAIR_KEYWORDS.some((k) => text.includes(k));
};

export function anyOf(...predicates: TaskPredicate[]): TaskPredicate {
  return (task) => predicates.some((p) => p(task));
}

export const isRepairRequest: TaskPredicate = anyOf(hasRequiredFields(), looksLikeRepairForm, mentionsRepairKeyword);

export type Classification =
  | { qualifies: true }
  | { qualifies: false; reason: 'outside-project' | 'not-a-repair-request' };

// The project gate runs first; tasks from other projects are never inspected.
export function classifyRepairTask(task: AsanaTask, projectGid: string): Classification {
  if (!isInProject(task, projectGid)) return { qualifies: false, reason: 'outside-project' };
  if (!isRepairRequest(task)) return { qualifies: false, reason: 'not-a-repair-request' };
  return { qualifies: true };
}
