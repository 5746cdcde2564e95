import { SQLiteSettingsRepository } from './adapters/database/SQLiteSettingsRepository';
import { SQLiteWordStore } from './adapters/database/SQLiteWordStore';
import { DictionaryApiWordSource } from './adapters/dictionary/DictionaryApiWordSource';
import { ConsoleLogger } from './adapters/logging/ConsoleLogger';
import { createMailer } from './adapters/mail/createMailer';
import { ConfigSource, SendDailyWordsUseCase } from './application/SendDailyWordsUseCase';
import { Config, createConfigSource, Env, loadConfig } from './config';

export function createLogger(config: Config): ConsoleLogger {
  return new ConsoleLogger(config.logging.level, config.logging.filePath, {
    maxSizeBytes: config.logging.maxSizeMB * 1024 * 1024,
    maxFiles: config.logging.maxFiles,
  });
}

export interface Application {
  env: Env;
  config: Config;
  logger: ConsoleLogger;
  wordStore: SQLiteWordStore;
  settings: SQLiteSettingsRepository;
  wordSource: DictionaryApiWordSource;
  configSource: ConfigSource;
  useCase: SendDailyWordsUseCase;
  close(): Promise<void>;
}

// Wires the concrete adapters. Throws ConfigInvalidError on a structurally broken environment.
export function buildApplication(env: Env = process.env): Application {
  const config = loadConfig(env);
  const logger = createLogger(config);

  const wordStore = new SQLiteWordStore(config.database.path);
  const settings = new SQLiteSettingsRepository(config.database.path);
  const wordSource = new DictionaryApiWordSource(config.dictionary, logger);
  const configSource = createConfigSource(env, settings);

  const useCase = new SendDailyWordsUseCase(
    wordStore,      // WordStore interface
    wordSource,     // WordSource interface
    configSource,   // env overlaid with stored settings
    (effective, log) => createMailer(effective, log),
    logger
  );

  return {
    env,
    config,
    logger,
    wordStore,
    settings,
    wordSource,
    configSource,
    useCase,
    async close() {
      await wordStore.close();
      await settings.close();
      logger.close();
    },
  };
}
