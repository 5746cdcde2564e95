#!/usr/bin/env node

import { SQLiteSettingsRepository } from '../adapters/database/SQLiteSettingsRepository';
import { describeConfig, inspectConfig, mergeSettings } from '../config';
import { errorMessage } from '../core/errors';

// Prints the effective (masked) configuration; exits 1 when a send could not succeed.
async function checkConfig() {
  const base = inspectConfig(process.env);
  if (!base.config) {
    console.error('Configuration is invalid:');
    base.errors.forEach((e) => console.error(`  - ${e}`));
    process.exitCode = 1;
    return;
  }

  const settings = new SQLiteSettingsRepository(base.config.database.path);
  let stored: Record<string, string>;
  try {
    stored = await settings.getAll();
  } finally {
    await settings.close();
  }

  const { config, errors } = inspectConfig(mergeSettings(process.env, stored));
  if (config) {
    console.log('Current configuration:');
    for (const [key, value] of Object.entries(describeConfig(config))) {
      console.log(`  ${key}: ${value === '' ? '(not set)' : value}`);
    }
  }

  if (errors.length > 0) {
    console.error('\nConfiguration is invalid:');
    errors.forEach((e) => console.error(`  - ${e}`));
    process.exitCode = 1;
    return;
  }
  console.log('\nConfiguration is valid.');
}

checkConfig().catch((error) => {
  console.error(`Config check failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
