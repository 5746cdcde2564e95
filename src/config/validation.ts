import { z } from 'zod';
import { DURATION_PATTERN, SCHEDULE_TIME_PATTERN } from '../core/time';

function isTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

export const configSchema = z.object({
  nodeEnv: z.string(),
  recipient: z.object({
    email: z.string(),
  }),
  mail: z.object({
    transport: z.enum(['auto', 'smtp', 'sendgrid']),
    from: z.string().optional(),
    timeoutMs: z.number().int().min(1000).max(120000),
    smtp: z.object({
      host: z.string().min(1),
      port: z.number().int().min(1).max(65535),
      user: z.string(),
      password: z.string(),
    }),
    sendgridApiKey: z.string(),
  }),
  bot: z.object({
    name: z.string().min(1),
    subjectPrefix: z.string(),
    wordsPerDay: z.number().int(),
    maxFetchAttempts: z.number().int().min(1).max(10),
    scheduleTime: z.string(),
    timezone: z.string().refine(isTimeZone, 'must be an IANA time zone such as Europe/London').optional(),
  }),
  dictionary: z.object({
    apiUrl: z.string().url(),
    timeoutMs: z.number().int().min(100).max(60000),
    maxDefinitionLength: z.number().int().min(20).max(1000),
    maxFailures: z.number().int().min(1).max(50),
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    filePath: z.string().optional(),
    maxSizeMB: z.number().min(1).max(1024).default(5),
    maxFiles: z.number().int().min(1).max(100).default(3),
  }),
  web: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    password: z.string(),
    tokenSecret: z.string().optional(),
    tokenTtl: z.string().regex(DURATION_PATTERN, 'must look like 30m, 12h, 7d or a number of seconds'),
    staticDir: z.string().min(1),
  }),
});

export type Config = z.infer<typeof configSchema>;

export type ResolvedTransport = 'smtp' | 'sendgrid' | 'none';

export function resolveTransport(config: Config): ResolvedTransport {
  const { mail } = config;
  if (mail.transport === 'smtp') return 'smtp';
  if (mail.transport === 'sendgrid') return 'sendgrid';
  if (mail.sendgridApiKey) return 'sendgrid';
  if (mail.smtp.user && mail.smtp.password) return 'smtp';
  return 'none';
}

const emailSchema = z.string().email();

// Everything a send needs beyond a structurally valid config.
export function deliveryProblems(config: Config): string[] {
  const errors: string[] = [];
  const { recipient, mail } = config;

  if (!recipient.email) {
    errors.push('RECIPIENT_EMAIL is required');
  } else if (!emailSchema.safeParse(recipient.email).success) {
    errors.push('RECIPIENT_EMAIL must be a valid email address');
  }

  if (mail.transport === 'auto' && !mail.smtp.user && !mail.sendgridApiKey) {
    errors.push('Either GMAIL_USER or SENDGRID_API_KEY must be configured');
  }
  const usingGmail = mail.transport === 'smtp' || (mail.transport === 'auto' && !mail.sendgridApiKey);
  if (usingGmail && mail.smtp.user && !mail.smtp.password) {
    errors.push('GMAIL_APP_PASSWORD is required when using Gmail');
  }
  if (mail.transport === 'smtp' && !mail.smtp.user) {
    errors.push('GMAIL_USER is required when MAIL_TRANSPORT is smtp');
  }
  if (mail.transport === 'sendgrid' && !mail.sendgridApiKey) {
    errors.push('SENDGRID_API_KEY is required when MAIL_TRANSPORT is sendgrid');
  }
  if (resolveTransport(config) === 'sendgrid' && !mail.from && !mail.smtp.user) {
    errors.push('MAIL_FROM (or GMAIL_USER) is required when sending through SendGrid');
  }

  return [...errors, ...botProblems(config)];
}

// Malformed values only; missing credentials are not reported here.
export function valueProblems(config: Config): string[] {
  const errors: string[] = [];
  if (config.recipient.email && !emailSchema.safeParse(config.recipient.email).success) {
    errors.push('RECIPIENT_EMAIL must be a valid email address');
  }
  return [...errors, ...botProblems(config)];
}

function botProblems({ bot }: Config): string[] {
  const errors: string[] = [];
  if (bot.wordsPerDay < 1 || bot.wordsPerDay > 10) {
    errors.push('WORDS_PER_DAY must be between 1 and 10');
  }
  if (!SCHEDULE_TIME_PATTERN.test(bot.scheduleTime)) {
    errors.push('SCHEDULE_TIME must be in HH:MM format (e.g., 09:00)');
  }
  return errors;
}
