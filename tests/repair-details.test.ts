import { describe, expect, it } from 'vitest';

import { buildNotificationSubject, buildRepairNotification } from '../src/services/notification-email';
import { extractRepairDetails } from '../src/services/repair-details';
import { enumField, makeTask, textField } from './helpers/fakes';

describe('extractRepairDetails', () => {
  it('applies fallbacks for every missing attribute', () => {
    expect(extractRepairDetails(makeTask({ gid: 'T1' }))).toEqual({
      firstName: 'Unknown',
      lastName: '',
      email: 'N/A',
      phone: 'N/A',
      address: 'Unknown',
      unitNumber: 'N/A',
      category: 'Other',
      urgency: 'Standard',
      specificIssue: 'Unspecified',
      description: 'No additional description provided',
    });
  });

  it('reads form fields and falls back to labelled lines in the notes', () => {
    const task = makeTask({
      gid: 'T2',
      notes: 'Property Address: 7 Harbor Road\nThe sink drips constantly.',
      fields: [
        textField('First Name', 'Ada'),
        textField('Last Name', 'Lovelace'),
        textField('Email Address', 'ada@example.com'),
        textField('Phone Number', '555-0100'),
        textField('Unit Number', '2A'),
        enumField('Issue Category', 'Plumbing'),
        enumField('Urgency Level', 'Standard'),
        enumField('What kind of standard issue?', 'Leaky faucet'),
      ],
    });

    expect(extractRepairDetails(task)).toEqual({
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.com',
      phone: '555-0100',
      address: '7 Harbor Road',
      unitNumber: '2A',
      category: 'Plumbing',
      urgency: 'Standard',
      specificIssue: 'Leaky faucet',
      description: 'Property Address: 7 Harbor Road\nThe sink drips constantly.',
    });
  });

  it('does not read unrelated note labels that contain a short name', () => {
    const task = makeTask({
      gid: 'T4',
      notes: 'Community: Oak Park\nEmail Address: sam@example.com\nPhone: 555-0199',
    });
    const details = extractRepairDetails(task);
    expect(details.unitNumber).toBe('N/A');
    expect(details.email).toBe('sam@example.com');
    expect(details.phone).toBe('555-0199');
  });

  it('uses the emergency issue question when the standard one is absent', () => {
    const task = makeTask({ gid: 'T3', fields: [enumField('What kind of emergency issue', 'Gas smell')] });
    expect(extractRepairDetails(task).specificIssue).toBe('Gas smell');
  });
});

describe('buildRepairNotification', () => {
  it('marks emergency subjects as urgent', () => {
    expect(buildNotificationSubject({ category: 'Plumbing', address: '1 Main St', urgency: 'Emergency' })).toBe(
      'URGENT: New Repair Request: Plumbing - 1 Main St',
    );
    expect(buildNotificationSubject({ category: 'HVAC', address: '1 Main St', urgency: 'Standard' })).toBe(
      'New Repair Request: HVAC - 1 Main St',
    );
  });

  it('escapes tenant-provided text and links the task', () => {
    const details = extractRepairDetails(
      makeTask({ gid: 'T9', notes: '<script>alert(1)</script>', fields: [textField('First Name', 'Bob & Co')] }),
    );
    const { html } = buildRepairNotification(details, 'T9');

    expect(html).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
    expect(html).toContain('<td style="border-bottom:1px solid #ddd">Bob &amp; Co</td>');
    expect(html).toContain('<a href="https://app.asana.com/0/0/T9">Open task in Asana</a>');
  });

  it('prefers the task permalink when known', () => {
    const details = extractRepairDetails(makeTask({ gid: 'T9' }));
    const { html } = buildRepairNotification(details, 'T9', 'https://app.asana.com/0/42/T9');
    expect(html).toContain('<a href="https://app.asana.com/0/42/T9">');
  });
});
