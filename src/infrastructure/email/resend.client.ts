import { Resend } from 'resend';

import { withRetry, type RetryOptions } from '@utils/retry.js';

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
  text: string;
}

export interface EmailClient {
  send(message: EmailMessage): Promise<void>;
}

/** The slice of `resend.emails` used here; the SDK reports failures in `error` instead of throwing. */
export interface EmailSender {
  send(payload: {
    from: string;
    to: string;
    subject: string;
    html: string;
    text: string;
  }): Promise<{ error: { message: string; name: string } | null }>;
}

const PROVIDER_ERROR_STATUS: Record<string, number> = {
  rate_limit_exceeded: 429,
  daily_quota_exceeded: 429,
  application_error: 500,
  internal_server_error: 500,
};

export class EmailDeliveryError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = 'EmailDeliveryError';
  }
}

export function createEmailClient(sender: EmailSender, from: string, retry: RetryOptions = {}): EmailClient {
  return {
    async send(message: EmailMessage): Promise<void> {
      await withRetry(
        async () => {
          const { error } = await sender.send({ from, ...message });
          if (error) {
            throw new EmailDeliveryError(
              `Email provider rejected message: ${error.message}`,
              PROVIDER_ERROR_STATUS[error.name] ?? null,
            );
          }
        },
        { label: 'email.send', ...retry },
      );
    },
  };
}

export function createResendClient(apiKey: string, from: string): EmailClient {
  return createEmailClient(new Resend(apiKey).emails, from);
}
