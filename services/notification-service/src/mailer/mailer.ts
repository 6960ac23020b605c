import { Dispatcher, request } from 'undici';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Logger, TransientError } from '@orderflow/shared';

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  /** Lets the relay drop a resend of a message it already accepted. */
  idempotencyKey: string;
}

export interface Mailer {
  send(message: MailMessage, signal: AbortSignal): Promise<{ messageId: string }>;
}

const relayResponse = z.object({ messageId: z.string().min(1) });

/** Posts mail to an HTTP relay at `${baseUrl}/messages`. */
export class HttpMailRelay implements Mailer {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly dispatcher?: Dispatcher
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async send(message: MailMessage, signal: AbortSignal): Promise<{ messageId: string }> {
    const res = await request(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'idempotency-key': message.idempotencyKey,
      },
      body: JSON.stringify({ to: message.to, subject: message.subject, text: message.text }),
      signal,
      dispatcher: this.dispatcher,
    });

    if (res.statusCode >= 300) {
      const detail = await res.body.text();
      throw new TransientError(`Mail relay answered ${res.statusCode}: ${detail}`);
    }

    const parsed = relayResponse.safeParse(await res.body.json());
    if (!parsed.success) {
      throw new TransientError('Mail relay response has no messageId');
    }
    return parsed.data;
  }
}

/** Writes mail to the log instead of sending it. */
export class LoggingMailer implements Mailer {
  constructor(private readonly logger: Logger) {}

  async send(message: MailMessage): Promise<{ messageId: string }> {
    const messageId = `log-${uuidv4()}`;
    this.logger.info('Mail not sent, no relay configured', {
      messageId,
      to: message.to,
      subject: message.subject,
    });
    return { messageId };
  }
}
