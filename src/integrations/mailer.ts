import nodemailer from 'nodemailer';

import { logger as rootLogger, type Logger } from '../logger/logger';
import { incExternalApiError } from '../metrics/metrics';

export type MailMessage = {
  from: string;
  to: string[];
  subject: string;
  html: string;
};

/**
 * Outbound mail capability. `send` resolves to false on failure and never rejects.
 */
export interface Mailer {
  send(message: MailMessage): Promise<boolean>;
}

export type SmtpSettings = { host: string; port: number; user: string | null; password: string | null };

export function createSmtpTransport(params: SmtpSettings) {
  return nodemailer.createTransport({
    host: params.host,
    port: params.port,
    secure: params.port === 465,
    ...(params.user ? { auth: { user: params.user, pass: params.password ?? '' } } : {}),
  });
}

export class SmtpMailer implements Mailer {
  private readonly transporter: ReturnType<typeof createSmtpTransport>;

  constructor(
    params: SmtpSettings,
    private readonly log: Logger = rootLogger,
  ) {
    this.transporter = createSmtpTransport(params);
  }

  async send(message: MailMessage): Promise<boolean> {
    if (!message.to.length) {
      this.log.warn({ subject: message.subject }, 'No recipients configured; email not sent');
      return false;
    }

    try {
      const info = await this.transporter.sendMail({
        from: message.from,
        to: message.to.join(', '),
        subject: message.subject,
        html: message.html,
      });
      this.log.info({ messageId: info.messageId, subject: message.subject }, 'Email sent');
      return true;
    } catch (err) {
      incExternalApiError('smtp');
      this.log.error({ err, subject: message.subject }, 'Failed to send email');
      return false;
    }
  }
}
