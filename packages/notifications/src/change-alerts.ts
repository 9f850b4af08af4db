/**
 * Change Alert Formatting
 *
 * Builds the critical alert (one change, sent immediately) and the
 * digest (a batch of same-priority changes) in every channel's format.
 */

import { wrapEmailTemplate, emailInfoBox, escapeHtml } from './channels/email.js';
import { slackHeader, slackText, slackDivider, slackContext, slackFieldsSection } from './channels/slack.js';
import type { AlertPriority, ChangeNotice, NotificationMessage, WebhookPayload } from './types.js';

export const DIGEST_DETAIL_LIMIT = 10;

const ACTION_VERBS: Record<ChangeNotice['changeType'], string> = {
  Added: 'added to',
  Removed: 'removed from',
  Modified: 'modified in',
};

const PRIORITY_ICONS: Record<AlertPriority, string> = {
  Critical: '🚨',
  High: '⚠️',
  Medium: '📋',
  Low: '📊',
};

/**
 * `2026-03-01 14:05:09 UTC`
 */
export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function webhookPayload(priority: AlertPriority, text: string, changes: ChangeNotice[], now: Date): WebhookPayload {
  return {
    priority,
    timestamp: now.toISOString(),
    changeCount: changes.length,
    message: text,
    changes: changes.map(change => ({
      eventId: change.eventId,
      source: change.source,
      entityUid: change.entityUid,
      entityName: change.entityName,
      changeType: change.changeType,
      riskLevel: change.riskLevel,
      summary: change.changeSummary,
    })),
  };
}

// =============================================================================
// Critical Alert
// =============================================================================

export function formatCriticalAlert(change: ChangeNotice, now = new Date()): NotificationMessage {
  const action = `${ACTION_VERBS[change.changeType]} ${change.source}`;
  const detected = formatUtc(change.detectedAt);

  const text = [
    '🚨 CRITICAL SANCTIONS ALERT',
    '',
    `Entity: ${change.entityName}`,
    `Action: ${action}`,
    `Change: ${change.changeSummary}`,
    `Detected: ${detected}`,
    '',
    'Immediate compliance review required.',
  ].join('\n');

  const html = wrapEmailTemplate(`
    ${emailInfoBox(`
      <h2 style="margin: 0 0 10px 0; font-size: 18px;">🚨 Critical Sanctions Alert</h2>
      <p style="margin: 0;">Immediate compliance review required.</p>
    `, 'error')}

    <table style="width: 100%; border-collapse: collapse;">
      <tr><td style="padding: 6px 0; color: #666; width: 120px;">Entity:</td><td style="padding: 6px 0;">${escapeHtml(change.entityName)}</td></tr>
      <tr><td style="padding: 6px 0; color: #666;">Action:</td><td style="padding: 6px 0;">${escapeHtml(action)}</td></tr>
      <tr><td style="padding: 6px 0; color: #666;">Change:</td><td style="padding: 6px 0;">${escapeHtml(change.changeSummary)}</td></tr>
      <tr><td style="padding: 6px 0; color: #666;">Detected:</td><td style="padding: 6px 0;">${detected}</td></tr>
    </table>
  `);

  return {
    priority: 'Critical',
    eventIds: [change.eventId],
    subject: `🚨 Critical sanctions change: ${change.entityName} ${action}`,
    text,
    html,
    slack: {
      text: `🚨 ${change.entityName} ${action}`,
      blocks: [
        slackHeader('🚨 Critical Sanctions Alert'),
        slackFieldsSection({
          Entity: change.entityName,
          Action: action,
          Source: change.source,
          Detected: detected,
        }),
        slackText(change.changeSummary),
        slackDivider(),
        slackContext(`Entity UID: ${change.entityUid} • Event: ${change.eventId}`),
      ],
    },
    webhook: webhookPayload('Critical', text, [change], now),
  };
}

// =============================================================================
// Digest
// =============================================================================

/**
 * `2 added, 1 modified`, in order of first appearance.
 */
export function summarizeChangeTypes(changes: ChangeNotice[]): string {
  const counts = new Map<string, number>();
  for (const change of changes) {
    const key = change.changeType.toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts].map(([type, count]) => `${count} ${type}`).join(', ');
}

export function formatDigest(priority: AlertPriority, changes: ChangeNotice[], now = new Date()): NotificationMessage {
  const icon = PRIORITY_ICONS[priority];
  const sources = [...new Set(changes.map(change => change.source))].join(', ');
  const typeSummary = `${summarizeChangeTypes(changes)} (${changes.length} total)`;
  const shown = changes.slice(0, DIGEST_DETAIL_LIMIT);
  const hidden = changes.length - shown.length;

  const details = shown.map((change, i) => `${i + 1}. ${change.changeSummary}`);
  if (hidden > 0) {
    details.push(`... and ${hidden} more changes`);
  }

  const text = [
    `${icon} ${priority.toUpperCase()} PRIORITY SANCTIONS UPDATE`,
    '',
    `Source: ${sources}`,
    `Changes: ${typeSummary}`,
    `Generated: ${formatUtc(now)}`,
    '',
    'Details:',
    ...details,
  ].join('\n');

  const html = wrapEmailTemplate(`
    ${emailInfoBox(`
      <h2 style="margin: 0 0 10px 0; font-size: 18px;">${icon} ${priority} priority sanctions update</h2>
      <p style="margin: 0;">${escapeHtml(sources)}: ${escapeHtml(typeSummary)}</p>
    `, priority === 'High' ? 'warning' : 'info')}

    <ol style="padding-left: 20px;">
      ${shown.map(change => `<li>${escapeHtml(change.changeSummary)}</li>`).join('\n      ')}
    </ol>
    ${hidden > 0 ? `<p style="color: #666;">... and ${hidden} more changes</p>` : ''}
  `);

  return {
    priority,
    eventIds: changes.map(change => change.eventId),
    subject: `${icon} ${priority} priority sanctions update: ${changes.length} changes (${sources})`,
    text,
    html,
    slack: {
      text: `${icon} ${priority} priority sanctions update: ${typeSummary}`,
      blocks: [
        slackHeader(`${icon} ${priority} Priority Sanctions Update`),
        slackFieldsSection({ Source: sources, Changes: typeSummary }),
        slackText(details.join('\n')),
        slackDivider(),
        slackContext(`Generated ${formatUtc(now)}`),
      ],
    },
    webhook: webhookPayload(priority, text, changes, now),
  };
}
