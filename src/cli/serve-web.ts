#!/usr/bin/env node

import crypto from 'crypto';
import path from 'path';
import { CronScheduler } from '../adapters/scheduler/CronScheduler';
import { buildApplication } from '../bootstrap';
import { inspectConfig, mergeSettings } from '../config';
import { ConfigInvalidError, errorMessage } from '../core/errors';
import { parseDurationSeconds } from '../core/time';
import { createWebApp, startWebServer, stopWebServer } from '../web/server';

async function serveWeb(withScheduler: boolean) {
  const app = buildApplication();
  const { config, logger } = app;

  try {
    if (!config.web.password) {
      throw new ConfigInvalidError(['WEB_PASSWORD is required to serve the web form']);
    }
    if (!config.web.tokenSecret) {
      logger.warn('WEB_TOKEN_SECRET not set; sessions end when the server restarts');
    }

    let scheduler: CronScheduler | undefined;
    if (withScheduler) {
      // Effective time may come from the settings table; delivery problems surface at send time.
      const effective = inspectConfig(mergeSettings(app.env, await app.settings.getAll())).config ?? config;
      scheduler = new CronScheduler(logger, effective.bot.timezone);
      scheduler.start(effective.bot.scheduleTime, async () => {
        await app.useCase.execute();
      });
    }

    const web = createWebApp({
      useCase: app.useCase,
      wordStore: app.wordStore,
      settings: app.settings,
      env: app.env,
      logger,
      scheduler,
      staticDir: path.resolve(config.web.staticDir),
      auth: {
        password: config.web.password,
        secret: config.web.tokenSecret ?? crypto.randomBytes(32).toString('hex'),
        tokenTtlSeconds: parseDurationSeconds(config.web.tokenTtl),
      },
    });
    const server = await startWebServer(web, config.web.host, config.web.port, logger);

    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      scheduler?.stop();
      await stopWebServer(server);
      await app.close();
      process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.on(signal, () => {
        shutdown(signal).catch((error) => {
          console.error(`Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        });
      });
    }
  } catch (error) {
    await app.close();
    throw error;
  }
}

serveWeb(process.argv.includes('--with-scheduler')).catch((error) => {
  console.error(`Web server failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
});
