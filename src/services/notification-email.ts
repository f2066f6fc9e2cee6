import { escapeHtml, renderKeyValueTable } from './html';
import { isEmergency } from './repair-catalog';
import { tenantName, type RepairRequestDetails } from './repair-details';

export type NotificationContent = {
  subject: string;
  html: string;
};

export function taskUrl(taskGid: string, permalinkUrl?: string | null): string {
  return permalinkUrl ?? `https://app.asana.com/0/0/${encodeURIComponent(taskGid)}`;
}

export function buildNotificationSubject(details: Pick<RepairRequestDetails, 'category' | 'address' | 'urgency'>): string {
  const prefix = isEmergency(details.urgency) ? 'URGENT: ' : '';
  return `${prefix}New Repair Request: ${details.category} - ${details.address}`;
}

export function buildRepairNotification(
  details: RepairRequestDetails,
  taskGid: string,
  permalinkUrl?: string | null,
): NotificationContent {
  const url = taskUrl(taskGid, permalinkUrl);
  const banner = isEmergency(details.urgency)
    ? '<p style="color:#b00020;font-weight:bold">Emergency request: immediate attention required.</p>'
    : '';

  const html = `
    <html>
      <body style="font-family:Arial,sans-serif;line-height:1.5">
        <h2>New Repair Request</h2>
        ${banner}
        <h3>Tenant</h3>
        ${renderKeyValueTable([
          ['Name', tenantName(details)],
          ['Email', details.email],
          ['Phone', details.phone],
        ])}
        <h3>Property</h3>
        ${renderKeyValueTable([
          ['Address', details.address],
          ['Unit', details.unitNumber],
        ])}
        <h3>Issue</h3>
        ${renderKeyValueTable([
          ['Category', details.category],
          ['Urgency', details.urgency],
          ['Specific issue', details.specificIssue],
        ])}
        <h3>Description</h3>
        <p style="white-space:pre-wrap">${escapeHtml(details.description)}</p>
        <p><a href="${escapeHtml(url)}">Open task in Asana</a></p>
      </body>
    </html>
  `;

  return { subject: buildNotificationSubject(details), html };
}
