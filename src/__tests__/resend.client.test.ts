import { describe, it, expect } from 'vitest';

import { createEmailClient, EmailDeliveryError, type EmailSender } from '@infra/email/resend.client.js';

type SendResult = Awaited<ReturnType<EmailSender['send']>>;

class ScriptedSender implements EmailSender {
  readonly payloads: Array<Parameters<EmailSender['send']>[0]> = [];

  constructor(private readonly results: SendResult[]) {}

  async send(payload: Parameters<EmailSender['send']>[0]): Promise<SendResult> {
    this.payloads.push(payload);
    return this.results.shift() ?? { error: null };
  }
}

const message = {
  to: 'alice@example.edu',
  subject: 'Booking confirmed - Computer Lab 101',
  html: '<p>Hi,</p>',
  text: 'Hi,',
};

describe('createEmailClient', () => {
  it('sends from the configured address', async () => {
    const sender = new ScriptedSender([]);
    await createEmailClient(sender, 'Room Booking <noreply@example.edu>').send(message);
    expect(sender.payloads).toEqual([{ from: 'Room Booking <noreply@example.edu>', ...message }]);
  });

  it('retries when the provider is rate limiting', async () => {
    const sender = new ScriptedSender([{ error: { name: 'rate_limit_exceeded', message: 'slow down' } }]);
    await createEmailClient(sender, 'noreply@example.edu', { base: 1, max: 2 }).send(message);
    expect(sender.payloads).toHaveLength(2);
  });

  it('fails at once on a rejected message', async () => {
    const sender = new ScriptedSender([{ error: { name: 'validation_error', message: 'invalid recipient' } }]);
    const send = createEmailClient(sender, 'noreply@example.edu', { base: 1, max: 2 }).send(message);

    await expect(send).rejects.toBeInstanceOf(EmailDeliveryError);
    await expect(send).rejects.toThrow('Email provider rejected message: invalid recipient');
    expect(sender.payloads).toHaveLength(1);
  });
});
