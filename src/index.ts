import { CronScheduler } from './adapters/scheduler/CronScheduler';
import { buildApplication } from './bootstrap';
import { errorMessage } from './core/errors';

async function main() {
  const app = buildApplication();
  const { logger } = app;

  try {
    logger.info('Starting Daily Vocabulary scheduler...');
    logger.info(`Environment: ${app.config.nodeEnv}`);
    logger.info(`Log level: ${app.config.logging.level}`);

    // Refuse to start with a config that could never deliver
    const effective = await app.configSource();

    const scheduler = new CronScheduler(logger, effective.bot.timezone);
    scheduler.start(effective.bot.scheduleTime, async () => {
      await app.useCase.execute();
    });

    const next = scheduler.nextRun();
    if (next) logger.info(`Next send: ${next.toISOString()}`);

    // Handle graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      scheduler.stop();
      await app.close();
      process.exit(0);
    };

    process.on('SIGINT', () => {
      shutdown('SIGINT').catch((error) => {
        console.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
    process.on('SIGTERM', () => {
      shutdown('SIGTERM').catch((error) => {
        console.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  } catch (error) {
    logger.error(`Error starting scheduler: ${errorMessage(error)}`);
    await app.close();
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(`Failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
});
