#!/usr/bin/env node

import { SQLiteWordStore } from '../adapters/database/SQLiteWordStore';
import { loadConfig } from '../config';
import { errorMessage } from '../core/errors';

async function wordStats() {
  const config = loadConfig();
  const wordStore = new SQLiteWordStore(config.database.path);

  try {
    const info = await wordStore.info();
    console.log(`Database: ${info.databasePath} (${(info.sizeBytes / 1024).toFixed(1)} KB)`);
    console.log(`Total words sent: ${info.count}`);
    console.log(`Sent today: ${info.sentToday}`);
    console.log(`First sent: ${info.oldest ? info.oldest.toISOString() : '-'}`);
    console.log(`Last sent: ${info.newest ? info.newest.toISOString() : '-'}`);

    const recent = await wordStore.recent(10);
    if (recent.length > 0) {
      console.log('\nRecent words:');
      recent.forEach((record, index) => {
        console.log(`${index + 1}. ${record.term} (${record.sentAt.toISOString().slice(0, 10)}): ${record.definition}`);
      });
    }
  } finally {
    await wordStore.close();
  }
}

wordStats().catch((error) => {
  console.error(`Failed to read stats: ${errorMessage(error)}`);
  process.exitCode = 1;
});
