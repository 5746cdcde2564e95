import { DeliveryFailedError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { DeliveryReceipt, Mailer, OutgoingEmail } from '../../core/services/Mailer';
import { FetchFn } from '../http';

export const SENDGRID_API_URL = 'https://api.sendgrid.com/v3';

export interface SendGridMailerOptions {
  apiKey: string;
  from: string;
  senderName: string;
  timeoutMs: number;
  apiUrl?: string;
}

export class SendGridMailer implements Mailer {
  readonly transport = 'sendgrid' as const;

  constructor(
    private options: SendGridMailerOptions,
    private logger: Logger,
    private fetchFn: FetchFn = fetch
  ) {}

  private get baseUrl(): string {
    return this.options.apiUrl ?? SENDGRID_API_URL;
  }

  private async call(path: string, init: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}${path}`, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new DeliveryFailedError(this.transport, errorMessage(error), { cause: error });
    }
    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new DeliveryFailedError(this.transport, `HTTP ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`);
    }
    return res;
  }

  async send(email: OutgoingEmail): Promise<DeliveryReceipt> {
    const content = [{ type: 'text/plain', value: email.text }];
    if (email.html) content.push({ type: 'text/html', value: email.html });

    const res = await this.call('/mail/send', {
      method: 'POST',
      body: JSON.stringify({
        personalizations: [{ to: [{ email: email.to }] }],
        from: { email: this.options.from, name: this.options.senderName },
        subject: email.subject,
        content,
      }),
    });

    const messageId = res.headers.get('x-message-id');
    this.logger.info(`Email sent to ${email.to} via SendGrid (status ${res.status})`);
    return { transport: this.transport, messageId };
  }

  // Authenticated read that sends nothing.
  async verify(): Promise<void> {
    await this.call('/scopes', { method: 'GET' });
    this.logger.info('SendGrid API key verified');
  }
}
