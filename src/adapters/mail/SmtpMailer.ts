import nodemailer, { Transporter } from 'nodemailer';
import SMTPTransport from 'nodemailer/lib/smtp-transport';
import { DeliveryFailedError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { DeliveryReceipt, Mailer, OutgoingEmail } from '../../core/services/Mailer';

export interface SmtpMailerOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  senderName: string;
  timeoutMs: number;
}

// Gmail by default: port 587 with STARTTLS and an app password.
export class SmtpMailer implements Mailer {
  readonly transport = 'smtp' as const;
  private transporter: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(
    private options: SmtpMailerOptions,
    private logger: Logger
  ) {
    this.transporter = nodemailer.createTransport({
      host: options.host,
      port: options.port,
      secure: options.port === 465,
      requireTLS: options.port !== 465,
      auth: { user: options.user, pass: options.password },
      connectionTimeout: options.timeoutMs,
      greetingTimeout: options.timeoutMs,
      socketTimeout: options.timeoutMs,
    });
  }

  async send(email: OutgoingEmail): Promise<DeliveryReceipt> {
    try {
      const info = await this.transporter.sendMail({
        from: { name: this.options.senderName, address: this.options.user },
        to: email.to,
        subject: email.subject,
        text: email.text,
        html: email.html,
      });
      this.logger.info(`Email sent to ${email.to} via SMTP (${info.messageId})`);
      return { transport: this.transport, messageId: info.messageId ?? null };
    } catch (error) {
      throw new DeliveryFailedError(this.transport, errorMessage(error), { cause: error });
    }
  }

  async verify(): Promise<void> {
    try {
      await this.transporter.verify();
      this.logger.info(`SMTP connection to ${this.options.host}:${this.options.port} verified`);
    } catch (error) {
      throw new DeliveryFailedError(this.transport, errorMessage(error), { cause: error });
    }
  }
}
