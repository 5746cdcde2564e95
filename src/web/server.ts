import http from 'http';
import express, { NextFunction, Request, Response, Router } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import { z } from 'zod';
import { describeConfig, EDITABLE_SETTINGS, Env, inspectConfig, mergeSettings, valueProblems } from '../config';
import { SendDailyWordsUseCase } from '../application/SendDailyWordsUseCase';
import { ConfigInvalidError, errorMessage, VocabularyBotError, VocabularyBotErrorCode } from '../core/errors';
import { SettingsRepository } from '../core/repositories/SettingsRepository';
import { WordStore } from '../core/repositories/WordStore';
import { Logger } from '../core/services/Logger';
import { Scheduler } from '../core/services/Scheduler';
import { issueToken, passwordMatches, requireAuth, WebAuthOptions } from './auth';

export interface WebAppDeps {
  useCase: SendDailyWordsUseCase;
  wordStore: WordStore;
  settings: SettingsRepository;
  env: Env;
  auth: WebAuthOptions;
  logger: Logger;
  scheduler?: Scheduler;
  staticDir?: string;
  loginAttemptsPerWindow?: number;
}

const STATUS_BY_CODE: Record<VocabularyBotErrorCode, number> = {
  CONFIG_INVALID: 400,
  WORKFLOW_BUSY: 409,
  NO_WORDS_AVAILABLE: 422,
  DELIVERY_FAILED: 502,
  SOURCE_UNAVAILABLE: 502,
  STORAGE_UNAVAILABLE: 503,
};

const loginSchema = z.object({ password: z.string() });

const settingsSchema = z
  .object(Object.fromEntries(EDITABLE_SETTINGS.map((key) => [key, z.string().trim().max(500).optional()])))
  .strict();

const statsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

// Errors raised by express.json() carry an HTTP status and an `entity.*` or `charset.*` type.
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function createWebApp(deps: WebAppDeps): express.Express {
  const { useCase, wordStore, settings, env, auth, logger, scheduler } = deps;
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', sending: useCase.running });
  });

  if (deps.staticDir) app.use(express.static(deps.staticDir));

  const loginLimiter = rateLimit({
    windowMs: 15 * 60_000,
    limit: deps.loginAttemptsPerWindow ?? 10,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'too_many_requests', message: 'Too many login attempts, try again later' },
  });

  app.post('/api/login', loginLimiter, (req, res) => {
    const body = loginSchema.safeParse(req.body);
    if (!body.success || !passwordMatches(auth.password, body.data.password)) {
      logger.warn(`Rejected web login from ${req.ip}`);
      return res.status(401).json({ error: 'unauthorized', message: 'Invalid password' });
    }
    res.json({ token: issueToken(auth), expiresIn: auth.tokenTtlSeconds });
  });

  const api = Router();
  api.use(requireAuth(auth.secret));

  const effectiveEnv = async (): Promise<Env> => mergeSettings(env, await settings.getAll());

  api.get('/config', async (_req, res, next) => {
    try {
      const { config, errors } = inspectConfig(await effectiveEnv());
      res.json({
        config: config ? describeConfig(config) : null,
        errors,
        schedule: scheduler?.info() ?? null,
      });
    } catch (err) {
      next(err);
    }
  });

  api.put('/settings', async (req, res, next) => {
    try {
      const body = settingsSchema.safeParse(req.body ?? {});
      if (!body.success) {
        return res.status(400).json({
          error: 'invalid_settings',
          errors: body.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`),
        });
      }

      const updates: Record<string, string> = {};
      for (const [key, value] of Object.entries(body.data)) {
        if (value !== undefined) updates[key] = value;
      }

      const stored = await settings.getAll();
      const { config, errors } = inspectConfig(mergeSettings(env, { ...stored, ...updates }));
      const problems = config ? valueProblems(config) : errors;
      if (!config || problems.length > 0) {
        return res.status(400).json({ error: 'invalid_settings', errors: problems });
      }

      await settings.setMany(updates);
      logger.info(`Settings updated: ${Object.keys(updates).join(', ') || 'none'}`);

      if ('SCHEDULE_TIME' in updates && scheduler?.info().running) {
        scheduler.reschedule(config.bot.scheduleTime);
      }

      const after = inspectConfig(await effectiveEnv());
      res.json({
        config: after.config ? describeConfig(after.config) : null,
        errors: after.errors,
        schedule: scheduler?.info() ?? null,
      });
    } catch (err) {
      next(err);
    }
  });

  api.get('/preview', async (_req, res, next) => {
    try {
      const preview = await useCase.preview();
      res.json({
        recipient: preview.recipient,
        subject: preview.email.subject,
        text: preview.email.text,
        html: preview.email.html,
        words: preview.words,
      });
    } catch (err) {
      next(err);
    }
  });

  api.post('/send', async (_req, res, next) => {
    try {
      const result = await useCase.execute();
      res.json({
        sent: result.words.map((w) => w.term),
        recorded: result.recorded,
        recipient: result.recipient,
        transport: result.receipt.transport,
        messageId: result.receipt.messageId,
      });
    } catch (err) {
      next(err);
    }
  });

  api.get('/stats', async (req, res, next) => {
    try {
      const query = statsQuerySchema.safeParse(req.query);
      const limit = query.success ? query.data.limit : 10;
      const [info, recent] = await Promise.all([wordStore.info(), wordStore.recent(limit)]);
      res.json({
        ...info,
        recent: recent.map((r) => ({
          term: r.term,
          definition: r.definition,
          partOfSpeech: r.partOfSpeech,
          example: r.example,
          sentAt: r.sentAt.toISOString(),
        })),
        schedule: scheduler?.info() ?? null,
      });
    } catch (err) {
      next(err);
    }
  });

  app.use('/api', api);

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(err)) {
      logger.warn(`Rejected request body on ${req.method} ${req.path}: ${err.type}`);
      return res.status(err.status).json({
        error: 'invalid_body',
        message: err.type === 'entity.too.large' ? 'Request body is too large' : 'Request body is not valid JSON',
      });
    }
    if (err instanceof VocabularyBotError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) logger.error(err.message);
      return res.status(status).json({
        error: err.code,
        message: err.message,
        ...(err instanceof ConfigInvalidError ? { errors: err.errors } : {}),
      });
    }
    logger.error(`Unhandled web error: ${errorMessage(err)}`, err);
    res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
  });

  return app;
}

export function startWebServer(app: express.Express, host: string, port: number, logger: Logger): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      logger.info(`Web form listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopWebServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
