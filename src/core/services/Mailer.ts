export type MailTransportName = 'smtp' | 'sendgrid';

export interface OutgoingEmail {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface DeliveryReceipt {
  transport: MailTransportName;
  messageId: string | null;
}

export interface Mailer {
  readonly transport: MailTransportName;
  // Throws DeliveryFailedError
  send(email: OutgoingEmail): Promise<DeliveryReceipt>;
  verify(): Promise<void>;
}
