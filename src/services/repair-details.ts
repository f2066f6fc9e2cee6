import type { AsanaTask } from '../integrations/asana';
import { extractField, extractFromNotes } from './asana-fields';
import { FALLBACK_CATEGORY } from './repair-catalog';

export type RepairRequestDetails = {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  address: string;
  unitNumber: string;
  category: string;
  urgency: string;
  specificIssue: string;
  description: string;
};

export const DEFAULT_URGENCY = 'Standard';
export const NO_DESCRIPTION = 'No additional description provided';

function field(task: AsanaTask, ...names: string[]): string | null {
  for (const name of names) {
    const v = extractField(task, name) ?? extractFromNotes(task.notes, name);
    if (v) return v;
  }
  return null;
}

// Form field by its full label, then the notes under any of the given labels.
function labelled(task: AsanaTask, fieldName: string, noteLabels: readonly string[]): string | null {
  const fromField = extractField(task, fieldName);
  if (fromField) return fromField;
  for (const label of noteLabels) {
    const v = extractFromNotes(task.notes, label);
    if (v) return v;
  }
  return null;
}

export function extractRepairDetails(task: AsanaTask): RepairRequestDetails {
  const notes = task.notes?.trim() ?? '';
  return {
    firstName: field(task, 'First Name') ?? 'Unknown',
    lastName: field(task, 'Last Name') ?? '',
    email: labelled(task, 'Email Address', ['Email Address', 'Email']) ?? 'N/A',
    phone: labelled(task, 'Phone Number', ['Phone Number', 'Phone']) ?? 'N/A',
    address: field(task, 'Property Address') ?? 'Unknown',
    unitNumber: labelled(task, 'Unit Number', ['Unit Number', 'Unit']) ?? 'N/A',
    category: field(task, 'Issue Category', 'Category') ?? FALLBACK_CATEGORY,
    urgency: field(task, 'Urgency', 'Priority') ?? DEFAULT_URGENCY,
    specificIssue: field(task, 'What kind of standard issue', 'What kind of emergency issue') ?? 'Unspecified',
    description: notes || NO_DESCRIPTION,
  };
}

export function tenantName(details: Pick<RepairRequestDetails, 'firstName' | 'lastName'>): string {
  return [details.firstName, details.lastName].filter((s) => s.length > 0).join(' ');
}
