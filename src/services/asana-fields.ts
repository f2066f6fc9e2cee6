import type { AsanaCustomField, AsanaTask } from '../integrations/asana';

/**
 * Decides whether a field label satisfies a logical attribute name.
 * The default rule is case-folded substring containment: "urgency" matches "Urgency Level".
 */
export type FieldNameMatcher = (fieldName: string, logicalName: string) => boolean;

export const containsIgnoreCase: FieldNameMatcher = (fieldName, logicalName) => {
  const wanted = logicalName.trim().toLowerCase();
  if (!wanted) return false;
  return fieldName.trim().toLowerCase().includes(wanted);
};

export function findCustomField(
  fields: readonly AsanaCustomField[],
  logicalName: string,
  matches: FieldNameMatcher = containsIgnoreCase,
): AsanaCustomField | null {
  return fields.find((f) => matches(f.name, logicalName)) ?? null;
}

export function customFieldValue(field: AsanaCustomField): string | null {
  switch (field.type) {
    case 'text': {
      const v = field.text_value?.trim() ?? '';
      return v || null;
    }
    case 'enum':
      return field.enum_value;
    case 'multi_enum':
      return field.multi_enum_values.length ? field.multi_enum_values.join(', ') : null;
    case 'number':
      return field.number_value === null ? null : String(field.number_value);
    case 'unsupported':
      return null;
  }
}

// First field whose label matches wins, in upstream order. Null when the field
// or its value is absent; callers supply their own default.
export function extractField(
  task: Pick<AsanaTask, 'custom_fields'>,
  logicalName: string,
  matches: FieldNameMatcher = containsIgnoreCase,
): string | null {
  const field = findCustomField(task.custom_fields, logicalName, matches);
  return field ? customFieldValue(field) : null;
}

export function hasFieldNamed(task: Pick<AsanaTask, 'custom_fields'>, tokens: readonly string[]): boolean {
  return task.custom_fields.some((f) => tokens.some((t) => containsIgnoreCase(f.name, t)));
}

function labelStartsWith(label: string, logicalName: string): boolean {
  const l = label.trim().toLowerCase();
  const wanted = logicalName.trim().toLowerCase();
  if (!wanted) return false;
  return l === wanted || (l.startsWith(wanted) && /^[\s?(]/.test(l.slice(wanted.length)));
}

/**
 * Reads `Label: value` (or `Label:` followed by the value on the next line) out of
 * free-text notes, as written by Asana form submissions.
 * The label must be the logical name itself or start with it as whole words:
 * "unit" matches "Unit Number" but not "Community".
 */
export function extractFromNotes(notes: string | null, logicalName: string): string | null {
  if (!notes) return null;
  const lines = notes.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const colon = line.indexOf(':');
    if (colon < 0) continue;
    if (!labelStartsWith(line.slice(0, colon), logicalName)) continue;

    const inline = line.slice(colon + 1).trim();
    if (inline) return inline;

    const next = lines.slice(i + 1).find((l) => l.trim().length > 0);
    return next ? next.trim() : null;
  }

  return null;
}
