import { describe, it, expect } from 'vitest';
import { formatCriticalAlert, formatDigest, formatUtc, summarizeChangeTypes } from '../change-alerts.js';
import type { ChangeNotice } from '../types.js';

function notice(overrides: Partial<ChangeNotice> = {}): ChangeNotice {
  return {
    eventId: 'evt-1',
    entityUid: '12345',
    entityName: 'IVANOV, Petr',
    source: 'OFAC',
    changeType: 'Removed',
    riskLevel: 'Critical',
    changeSummary: 'Entity removed from sanctions list: IVANOV, Petr',
    detectedAt: new Date('2026-03-01T14:05:09.000Z'),
    ...overrides,
  };
}

describe('formatUtc', () => {
  it('renders seconds precision in UTC', () => {
    expect(formatUtc(new Date('2026-03-01T14:05:09.789Z'))).toBe('2026-03-01 14:05:09 UTC');
  });
});

describe('formatCriticalAlert', () => {
  it('names the entity, action and detection time', () => {
    const message = formatCriticalAlert(notice(), new Date('2026-03-01T14:06:00.000Z'));

    expect(message.priority).toBe('Critical');
    expect(message.eventIds).toEqual(['evt-1']);
    expect(message.subject).toBe('🚨 Critical sanctions change: IVANOV, Petr removed from OFAC');
    expect(message.text.split('\n')).toEqual([
      '🚨 CRITICAL SANCTIONS ALERT',
      '',
      'Entity: IVANOV, Petr',
      'Action: removed from OFAC',
      'Change: Entity removed from sanctions list: IVANOV, Petr',
      'Detected: 2026-03-01 14:05:09 UTC',
      '',
      'Immediate compliance review required.',
    ]);
    expect(message.webhook.timestamp).toBe('2026-03-01T14:06:00.000Z');
    expect(message.webhook.changes).toEqual([
      {
        eventId: 'evt-1',
        source: 'OFAC',
        entityUid: '12345',
        entityName: 'IVANOV, Petr',
        changeType: 'Removed',
        riskLevel: 'Critical',
        summary: 'Entity removed from sanctions list: IVANOV, Petr',
      },
    ]);
  });

  it('uses the matching verb for additions', () => {
    const message = formatCriticalAlert(notice({ changeType: 'Added' }));
    expect(message.slack.text).toBe('🚨 IVANOV, Petr added to OFAC');
  });

  it('escapes entity names in html', () => {
    const message = formatCriticalAlert(notice({ entityName: 'A <b> & Co' }));
    expect(message.html).toContain('A &lt;b&gt; &amp; Co');
    expect(message.html).not.toContain('A <b> & Co');
  });
});

describe('formatDigest', () => {
  const changes = Array.from({ length: 12 }, (_, i) =>
    notice({
      eventId: `evt-${i}`,
      changeType: i % 3 === 0 ? 'Modified' : 'Added',
      riskLevel: 'High',
      changeSummary: `change ${i}`,
    })
  );

  it('counts change types in order of first appearance', () => {
    expect(summarizeChangeTypes(changes)).toBe('4 modified, 8 added');
  });

  it('lists the first ten summaries then the remainder count', () => {
    const message = formatDigest('High', changes, new Date('2026-03-01T15:00:00.000Z'));
    const lines = message.text.split('\n');

    expect(lines.slice(0, 7)).toEqual([
      '⚠️ HIGH PRIORITY SANCTIONS UPDATE',
      '',
      'Source: OFAC',
      'Changes: 4 modified, 8 added (12 total)',
      'Generated: 2026-03-01 15:00:00 UTC',
      '',
      'Details:',
    ]);
    expect(lines[7]).toBe('1. change 0');
    expect(lines[16]).toBe('10. change 9');
    expect(lines[17]).toBe('... and 2 more changes');
    expect(lines).toHaveLength(18);
    expect(message.eventIds).toHaveLength(12);
    expect(message.webhook.changeCount).toBe(12);
  });

  it('lists every source in the batch', () => {
    const message = formatDigest('Low', [notice({ riskLevel: 'Low' }), notice({ eventId: 'evt-2', source: 'UN' })]);
    expect(message.subject).toBe('📊 Low priority sanctions update: 2 changes (OFAC, UN)');
  });
});
