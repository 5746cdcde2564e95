import { createMailer } from '../createMailer';
import { SendGridMailer } from '../SendGridMailer';
import { SmtpMailer } from '../SmtpMailer';
import { loadConfig } from '../../../config';
import { ConfigInvalidError } from '../../../core/errors';
import { createMockLogger, TEST_ENV } from '../../../test/helpers';

describe('createMailer', () => {
  it('should build an SMTP mailer for Gmail credentials', () => {
    const mailer = createMailer(loadConfig(TEST_ENV), createMockLogger());

    expect(mailer).toBeInstanceOf(SmtpMailer);
    expect(mailer.transport).toBe('smtp');
  });

  it('should prefer SendGrid when a key is configured', () => {
    const mailer = createMailer(loadConfig({ ...TEST_ENV, SENDGRID_API_KEY: 'test-secret' }), createMockLogger());

    expect(mailer).toBeInstanceOf(SendGridMailer);
  });

  it('should refuse a config that cannot deliver', () => {
    expect(() => createMailer(loadConfig({}), createMockLogger())).toThrow(ConfigInvalidError);
  });
});
