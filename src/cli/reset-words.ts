#!/usr/bin/env node

import { SQLiteWordStore } from '../adapters/database/SQLiteWordStore';
import { loadConfig } from '../config';
import { errorMessage } from '../core/errors';

async function resetWords() {
  if (!process.argv.includes('--yes')) {
    console.error('This deletes every sent-word record. Re-run with --yes to confirm.');
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const wordStore = new SQLiteWordStore(config.database.path);
  try {
    const removed = await wordStore.reset();
    console.log(`Cleared sent_words table (${removed} rows).`);
  } finally {
    await wordStore.close();
  }
}

resetWords().catch((error) => {
  console.error(`Failed to reset word store: ${errorMessage(error)}`);
  process.exitCode = 1;
});
