import { DateTime } from 'luxon';

import type { Booking } from '@core/interfaces/booking.types.js';
import type { Space, UserContact } from '@core/interfaces/space.types.js';

import type { EmailMessage } from '@infra/email/resend.client.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatWhen(booking: Pick<Booking, 'startAt' | 'endAt'>, tz: string): string {
  const start = DateTime.fromJSDate(booking.startAt).setZone(tz);
  const end = DateTime.fromJSDate(booking.endAt).setZone(tz);
  return `${start.toFormat('dd/LL/yyyy HH:mm')} - ${end.toFormat('HH:mm')}`;
}

/** "1 hour", "24 hours", "90 minutes". */
export function formatLeadTime(hours: number): string {
  if (Number.isInteger(hours)) return hours === 1 ? '1 hour' : `${hours} hours`;
  return `${Math.round(hours * 60)} minutes`;
}

export interface TemplateContext {
  tz: string;
  reminderLeadHours: number;
}

/** A paragraph of the body, rendered once as HTML and once as plain text. */
type Block = { html: string; text: string };

function paragraph(text: string): Block {
  return { html: `<p>${escapeHtml(text)}</p>`, text };
}

function details(booking: Booking, space: Space, tz: string): Block {
  const rows: Array<[string, string]> = [
    ['Space', space.name],
    ['Location', space.location],
    ['When', formatWhen(booking, tz)],
    ['Purpose', booking.purpose],
    ['Materials', booking.materialsRequested.length ? booking.materialsRequested.join(', ') : 'None'],
  ];
  return {
    html: ['<ul>', ...rows.map(([k, v]) => `<li><strong>${k}:</strong> ${escapeHtml(v)}</li>`), '</ul>'].join('\n'),
    text: rows.map(([k, v]) => `- ${k}: ${v}`).join('\n'),
  };
}

function greeting(owner: UserContact): Block {
  return paragraph(owner.fullName ? `Hi ${owner.fullName},` : 'Hi,');
}

function compose(to: string, subject: string, blocks: Block[]): EmailMessage {
  return {
    to,
    subject,
    html: blocks.map((b) => b.html).join('\n'),
    text: blocks.map((b) => b.text).join('\n\n'),
  };
}

export function confirmationEmail(
  booking: Booking,
  space: Space,
  owner: UserContact,
  ctx: TemplateContext,
): EmailMessage {
  return compose(owner.email, `Booking confirmed - ${space.name}`, [
    greeting(owner),
    paragraph('Your booking has been confirmed.'),
    details(booking, space, ctx.tz),
    paragraph(`We will send you a reminder ${formatLeadTime(ctx.reminderLeadHours)} before it starts.`),
  ]);
}

export function rescheduleEmail(
  booking: Booking,
  space: Space,
  owner: UserContact,
  ctx: TemplateContext,
): EmailMessage {
  return compose(owner.email, `Booking rescheduled - ${space.name}`, [
    greeting(owner),
    paragraph('Your booking has been moved. The new details are:'),
    details(booking, space, ctx.tz),
  ]);
}

export function cancellationEmail(
  booking: Booking,
  space: Space,
  owner: UserContact,
  reason: string | null,
  ctx: TemplateContext,
): EmailMessage {
  const blocks = [greeting(owner), paragraph('Your booking has been cancelled.'), details(booking, space, ctx.tz)];
  if (reason) {
    blocks.push({ html: `<p><strong>Reason:</strong> ${escapeHtml(reason)}</p>`, text: `Reason: ${reason}` });
  }
  return compose(owner.email, `Booking cancelled - ${space.name}`, blocks);
}

export function reminderEmail(booking: Booking, space: Space, owner: UserContact, ctx: TemplateContext): EmailMessage {
  const lead = formatLeadTime(ctx.reminderLeadHours);
  return compose(owner.email, `Reminder: ${space.name} in ${lead}`, [
    greeting(owner),
    paragraph(`Your booking starts in ${lead}.`),
    details(booking, space, ctx.tz),
  ]);
}
