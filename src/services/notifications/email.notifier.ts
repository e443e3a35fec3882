import type { Booking } from '@core/interfaces/booking.types.js';
import type { DeliveryStatus, Notifier } from '@core/interfaces/ports.js';
import type { Space, UserContact } from '@core/interfaces/space.types.js';

import type { EmailClient, EmailMessage } from '@infra/email/resend.client.js';

import { logger } from '@utils/logger.js';
import { tzOfSpace } from '@utils/time.js';

import {
  cancellationEmail,
  confirmationEmail,
  reminderEmail,
  rescheduleEmail,
  type TemplateContext,
} from './email.templates.js';

/** Booking emails. Without a client every call resolves `skipped`. */
export class EmailNotifier implements Notifier {
  constructor(
    private readonly client: EmailClient | null,
    private readonly timezone: string,
    private readonly reminderLeadHours = 24,
  ) {}

  notifyCreated(booking: Booking, space: Space, owner: UserContact): Promise<DeliveryStatus> {
    return this.deliver('confirmation', confirmationEmail(booking, space, owner, this.context(space)));
  }

  notifyRescheduled(booking: Booking, space: Space, owner: UserContact): Promise<DeliveryStatus> {
    return this.deliver('reschedule', rescheduleEmail(booking, space, owner, this.context(space)));
  }

  notifyCancelled(
    booking: Booking,
    space: Space,
    owner: UserContact,
    reason: string | null,
  ): Promise<DeliveryStatus> {
    return this.deliver('cancellation', cancellationEmail(booking, space, owner, reason, this.context(space)));
  }

  sendReminder(booking: Booking, space: Space, owner: UserContact): Promise<DeliveryStatus> {
    return this.deliver('reminder', reminderEmail(booking, space, owner, this.context(space)));
  }

  private context(space: Space): TemplateContext {
    return { tz: tzOfSpace(space, this.timezone), reminderLeadHours: this.reminderLeadHours };
  }

  private async deliver(kind: string, message: EmailMessage): Promise<DeliveryStatus> {
    if (!this.client) {
      logger.info(`[email] not configured, ${kind} email not sent`);
      return 'skipped';
    }
    await this.client.send(message);
    logger.info(`[email] ${kind} email sent`, { kind });
    return 'sent';
  }
}
