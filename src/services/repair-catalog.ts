export type CategoryEntry = {
  tag: string;
  steps: readonly string[];
};

export const FALLBACK_CATEGORY = 'Other';

const CATEGORIES: Readonly<Record<string, CategoryEntry>> = {
  Plumbing: {
    tag: '🚿',
    steps: ['Shut off water supply if leaking', 'Inspect pipes and fixtures', 'Check for water damage'],
  },
  Electrical: {
    tag: '⚡',
    steps: ['Check breaker panel', 'Inspect wiring and outlets', 'Schedule licensed electrician'],
  },
  HVAC: {
    tag: '❄️',
    steps: ['Check thermostat settings', 'Inspect filters and vents', 'Schedule HVAC technician'],
  },
  Appliance: {
    tag: '🔌',
    steps: ['Identify appliance make and model', 'Check warranty status', 'Diagnose appliance fault'],
  },
  Structural: {
    tag: '🏠',
    steps: ['Inspect structural damage', 'Assess safety of affected area', 'Obtain contractor quote'],
  },
  'Pest Control': {
    tag: '🐜',
    steps: ['Identify pest type', 'Schedule pest control service', 'Inspect for entry points'],
  },
  [FALLBACK_CATEGORY]: {
    tag: '🔧',
    steps: ['Diagnose reported issue'],
  },
};

export const BASE_STEPS = [
  'Assess issue and document damage',
  'Contact tenant to confirm details',
  'Schedule repair visit',
] as const;

export const EMERGENCY_STEPS = ['Immediate safety check', 'Escalate to emergency maintenance contact'] as const;

export const CLOSING_STEPS = [
  'Procure parts and materials',
  'Complete repair work',
  'Verify repair quality',
  'Follow up with tenant',
] as const;

export function isEmergency(urgency: string): boolean {
  return urgency.trim().toLowerCase() === 'emergency';
}

export function lookupCategory(category: string): { name: string; entry: CategoryEntry } {
  const wanted = category.trim().toLowerCase();
  for (const [name, entry] of Object.entries(CATEGORIES)) {
    if (name.toLowerCase() === wanted) return { name, entry };
  }
  return { name: FALLBACK_CATEGORY, entry: CATEGORIES[FALLBACK_CATEGORY] };
}

export function categoryTag(category: string): string {
  return lookupCategory(category).entry.tag;
}

export function buildChecklist(category: string, urgency: string): string[] {
  const [first, ...rest] = BASE_STEPS;
  const prefix = isEmergency(urgency) ? [first, ...EMERGENCY_STEPS, ...rest] : [...BASE_STEPS];
  return [...prefix, ...lookupCategory(category).entry.steps, ...CLOSING_STEPS];
}
