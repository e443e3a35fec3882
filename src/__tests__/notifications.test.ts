import { describe, it, expect } from 'vitest';

import type { Booking } from '@core/interfaces/booking.types.js';

import { EmailNotifier } from '@services/notifications/email.notifier.js';
import { escapeHtml, formatLeadTime, formatWhen } from '@services/notifications/email.templates.js';
import { runSideEffect, skipped, warningsOf } from '@services/notifications/side-effects.js';

import { RecordingEmailClient } from '@test/utils/fakes.js';
import { ALICE, makeSpace } from '@test/utils/harness.js';

const booking: Booking = {
  id: '123e4567-e89b-12d3-a456-426614174000',
  ownerId: ALICE.id,
  spaceId: 'lab-101',
  startAt: new Date('2030-03-06T09:00:00Z'),
  endAt: new Date('2030-03-06T11:00:00Z'),
  status: 'confirmed',
  purpose: '<b>Robotics</b> club',
  materialsRequested: ['projector', 'whiteboard'],
  notes: '',
  createdAt: new Date('2030-03-04T08:00:00Z'),
  updatedAt: new Date('2030-03-04T08:00:00Z'),
  cancellationReason: null,
};

describe('email templates', () => {
  it('escapes markup', () => {
    expect(escapeHtml(`<a href="x">Q&A 'open'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Q&amp;A &#39;open&#39;&lt;/a&gt;',
    );
  });

  it('formats the interval in local time', () => {
    expect(formatWhen(booking, 'Europe/Rome')).toBe('06/03/2030 10:00 - 12:00');
  });

  it('words the reminder lead time', () => {
    expect(formatLeadTime(1)).toBe('1 hour');
    expect(formatLeadTime(24)).toBe('24 hours');
    expect(formatLeadTime(1.5)).toBe('90 minutes');
  });
});

describe('EmailNotifier', () => {
  it('sends a confirmation with the booking details', async () => {
    const client = new RecordingEmailClient();
    const notifier = new EmailNotifier(client, 'Europe/Rome');

    expect(await notifier.notifyCreated(booking, makeSpace(), ALICE)).toBe('sent');
    const [message] = client.sent;
    expect(message?.to).toBe('alice@example.edu');
    expect(message?.subject).toBe('Booking confirmed - Computer Lab 101');
    expect(message?.html).toContain('<li><strong>When:</strong> 06/03/2030 10:00 - 12:00</li>');
    expect(message?.html).toContain('<li><strong>Purpose:</strong> &lt;b&gt;Robotics&lt;/b&gt; club</li>');
    expect(message?.html).toContain('<li><strong>Materials:</strong> projector, whiteboard</li>');
  });

  it('includes the cancellation reason', async () => {
    const client = new RecordingEmailClient();
    const notifier = new EmailNotifier(client, 'Europe/Rome');

    await notifier.notifyCancelled(booking, makeSpace(), ALICE, 'Room needed for exams');
    expect(client.sent[0]?.subject).toBe('Booking cancelled - Computer Lab 101');
    expect(client.sent[0]?.html).toContain('<p><strong>Reason:</strong> Room needed for exams</p>');
  });

  it('renders a plain-text body alongside the html', async () => {
    const client = new RecordingEmailClient();
    await new EmailNotifier(client, 'Europe/Rome').notifyCancelled(booking, makeSpace(), ALICE, 'Exams');
    expect(client.sent[0]?.text).toBe(
      [
        'Hi Alice Example,',
        'Your booking has been cancelled.',
        [
          '- Space: Computer Lab 101',
          '- Location: Building A',
          '- When: 06/03/2030 10:00 - 12:00',
          '- Purpose: <b>Robotics</b> club',
          '- Materials: projector, whiteboard',
        ].join('\n'),
        'Reason: Exams',
      ].join('\n\n'),
    );
  });

  it('words reminders from the configured lead time', async () => {
    const client = new RecordingEmailClient();
    const notifier = new EmailNotifier(client, 'Europe/Rome', 2);

    await notifier.sendReminder(booking, makeSpace(), ALICE);
    await notifier.notifyCreated(booking, makeSpace(), ALICE);

    expect(client.sent[0]?.subject).toBe('Reminder: Computer Lab 101 in 2 hours');
    expect(client.sent[0]?.html).toContain('<p>Your booking starts in 2 hours.</p>');
    expect(client.sent[1]?.html).toContain('<p>We will send you a reminder 2 hours before it starts.</p>');
  });

  it('defaults to a 24 hour reminder', async () => {
    const client = new RecordingEmailClient();
    await new EmailNotifier(client, 'Europe/Rome').sendReminder(booking, makeSpace(), ALICE);
    expect(client.sent[0]?.subject).toBe('Reminder: Computer Lab 101 in 24 hours');
  });

  it('skips delivery without a client', async () => {
    const notifier = new EmailNotifier(null, 'Europe/Rome');
    expect(await notifier.notifyRescheduled(booking, makeSpace(), ALICE)).toBe('skipped');
  });
});

describe('runSideEffect', () => {
  it('passes the task status through', async () => {
    expect(await runSideEffect('calendar_upsert', async () => 'skipped', 100)).toEqual({
      effect: 'calendar_upsert',
      status: 'skipped',
    });
  });

  it('turns a rejection into a failed outcome', async () => {
    const outcome = await runSideEffect(
      'confirmation_email',
      async () => {
        throw new Error('mailbox full');
      },
      100,
    );
    expect(outcome).toEqual({ effect: 'confirmation_email', status: 'failed', detail: 'mailbox full' });
  });

  it('fails a task that outlives its timeout', async () => {
    const outcome = await runSideEffect('reminder_schedule', () => new Promise<'ok'>(() => undefined), 10);
    expect(outcome).toEqual({
      effect: 'reminder_schedule',
      status: 'failed',
      detail: 'reminder_schedule timed out after 10ms',
    });
  });

  it('lists only failures as warnings', () => {
    expect(
      warningsOf([
        { effect: 'calendar_upsert', status: 'ok' },
        skipped('confirmation_email', 'owner contact not found'),
        { effect: 'reminder_cancel', status: 'failed', detail: 'queue offline' },
      ]),
    ).toEqual(['reminder_cancel: queue offline']);
  });
});
