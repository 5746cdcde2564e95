import { Config, deliveryProblems, resolveTransport } from '../../config/validation';
import { ConfigInvalidError } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { Mailer } from '../../core/services/Mailer';
import { FetchFn } from '../http';
import { SendGridMailer } from './SendGridMailer';
import { SmtpMailer } from './SmtpMailer';

export function createMailer(config: Config, logger: Logger, fetchFn: FetchFn = fetch): Mailer {
  const problems = deliveryProblems(config);
  if (problems.length > 0) throw new ConfigInvalidError(problems);

  const { mail, bot } = config;
  switch (resolveTransport(config)) {
    case 'sendgrid':
      logger.debug('Using SendGrid for delivery');
      return new SendGridMailer(
        {
          apiKey: mail.sendgridApiKey,
          from: mail.from ?? mail.smtp.user,
          senderName: bot.name,
          timeoutMs: mail.timeoutMs,
        },
        logger,
        fetchFn
      );
    case 'smtp':
      logger.debug(`Using SMTP ${mail.smtp.host}:${mail.smtp.port} for delivery`);
      return new SmtpMailer(
        {
          host: mail.smtp.host,
          port: mail.smtp.port,
          user: mail.smtp.user,
          password: mail.smtp.password,
          senderName: bot.name,
          timeoutMs: mail.timeoutMs,
        },
        logger
      );
    case 'none':
      throw new ConfigInvalidError(['Either GMAIL_USER or SENDGRID_API_KEY must be configured']);
  }
}
