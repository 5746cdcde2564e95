import dotenv from 'dotenv';
import type { ZodIssue } from 'zod';
import { configSchema, Config, deliveryProblems, resolveTransport } from './validation';
import { ConfigInvalidError } from '../core/errors';
import { SettingsRepository } from '../core/repositories/SettingsRepository';

export type { Config } from './validation';
export { resolveTransport, deliveryProblems, valueProblems } from './validation';

// Load environment variables based on NODE_ENV
const envFile = process.env.NODE_ENV === 'production' ? '.env.production' : '.env';
dotenv.config({ path: envFile });

export type Env = Record<string, string | undefined>;

// Keys the web form may override; stored in the settings table.
export const EDITABLE_SETTINGS = [
  'RECIPIENT_EMAIL',
  'GMAIL_USER',
  'GMAIL_APP_PASSWORD',
  'SENDGRID_API_KEY',
  'MAIL_TRANSPORT',
  'MAIL_FROM',
  'BOT_NAME',
  'WORDS_PER_DAY',
  'SCHEDULE_TIME',
] as const;

export type EditableSetting = (typeof EDITABLE_SETTINGS)[number];

// NaN and fractions are left for the schema to reject
function int(value: string | undefined, fallback: number): number {
  return value && value.trim() ? Number(value) : fallback;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function readRawConfig(env: Env) {
  return {
    nodeEnv: env.NODE_ENV || 'development',
    recipient: {
      email: (env.RECIPIENT_EMAIL || '').trim(),
    },
    mail: {
      transport: (env.MAIL_TRANSPORT || 'auto').toLowerCase(),
      from: optional(env.MAIL_FROM),
      timeoutMs: int(env.MAIL_TIMEOUT_MS, 15000),
      smtp: {
        host: env.SMTP_HOST || 'smtp.gmail.com',
        port: int(env.SMTP_PORT, 587),
        user: (env.GMAIL_USER || '').trim(),
        password: env.GMAIL_APP_PASSWORD || '',
      },
      sendgridApiKey: env.SENDGRID_API_KEY || '',
    },
    bot: {
      name: env.BOT_NAME || 'Daily Vocabulary Bot',
      subjectPrefix: env.EMAIL_SUBJECT_PREFIX ?? '📚',
      wordsPerDay: int(env.WORDS_PER_DAY, 2),
      maxFetchAttempts: int(env.WORD_FETCH_ATTEMPTS, 3),
      scheduleTime: (env.SCHEDULE_TIME || '09:00').trim(),
      timezone: optional(env.SCHEDULE_TIMEZONE),
    },
    dictionary: {
      apiUrl: (env.DICTIONARY_API_URL || 'https://api.dictionaryapi.dev/api/v2/entries/en').replace(/\/+$/, ''),
      timeoutMs: int(env.DICTIONARY_TIMEOUT_MS, 10000),
      maxDefinitionLength: int(env.DICTIONARY_MAX_DEFINITION_LENGTH, 120),
      maxFailures: int(env.DICTIONARY_MAX_FAILURES, 3),
    },
    database: {
      path: env.DATABASE_PATH || './data/vocabulary.db',
    },
    logging: {
      level: (env.LOG_LEVEL || 'info').toLowerCase(),
      filePath: optional(env.LOG_FILE),
      maxSizeMB: int(env.LOG_MAX_SIZE_MB, 5),
      maxFiles: int(env.LOG_MAX_FILES, 3),
    },
    web: {
      host: env.WEB_HOST || '127.0.0.1',
      port: int(env.WEB_PORT, 5000),
      password: env.WEB_PASSWORD || '',
      tokenSecret: optional(env.WEB_TOKEN_SECRET),
      tokenTtl: env.WEB_TOKEN_TTL || '12h',
      staticDir: env.WEB_STATIC_DIR || './public',
    },
  };
}

function formatIssue(issue: ZodIssue): string {
  return `${issue.path.join('.')}: ${issue.message}`;
}

export interface ConfigInspection {
  config: Config | null;
  errors: string[];
}

// Never throws; used by the config check and the web form.
export function inspectConfig(env: Env = process.env): ConfigInspection {
  const parsed = configSchema.safeParse(readRawConfig(env));
  if (!parsed.success) {
    return { config: null, errors: parsed.error.issues.map(formatIssue) };
  }
  return { config: parsed.data, errors: deliveryProblems(parsed.data) };
}

export function loadConfig(env: Env = process.env, options: { requireDelivery?: boolean } = {}): Config {
  const { config, errors } = inspectConfig(env);
  if (!config) throw new ConfigInvalidError(errors);
  if (options.requireDelivery && errors.length > 0) throw new ConfigInvalidError(errors);
  return config;
}

export function mergeSettings(env: Env, settings: Record<string, string>): Env {
  const merged: Env = { ...env };
  for (const key of EDITABLE_SETTINGS) {
    const value = settings[key];
    if (value !== undefined && value !== '') merged[key] = value;
  }
  return merged;
}

// Effective delivery config: environment overlaid with settings entered on the web form.
export function createConfigSource(env: Env, settings: SettingsRepository): () => Promise<Config> {
  return async () => loadConfig(mergeSettings(env, await settings.getAll()), { requireDelivery: true });
}

function mask(value: string): string {
  if (!value) return '';
  return value.length <= 4 ? '****' : `${value.slice(0, 2)}****${value.slice(-2)}`;
}

export interface ConfigSummary {
  recipientEmail: string;
  emailService: string;
  gmailUser: string;
  gmailAppPassword: string;
  sendgridApiKey: string;
  wordsPerDay: number;
  scheduleTime: string;
  timezone: string;
  database: string;
  botName: string;
}

export function describeConfig(config: Config): ConfigSummary {
  return {
    recipientEmail: config.recipient.email,
    emailService: resolveTransport(config),
    gmailUser: config.mail.smtp.user,
    gmailAppPassword: mask(config.mail.smtp.password),
    sendgridApiKey: mask(config.mail.sendgridApiKey),
    wordsPerDay: config.bot.wordsPerDay,
    scheduleTime: config.bot.scheduleTime,
    timezone: config.bot.timezone ?? 'local',
    database: config.database.path,
    botName: config.bot.name,
  };
}
