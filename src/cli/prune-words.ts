#!/usr/bin/env node

import { SQLiteWordStore } from '../adapters/database/SQLiteWordStore';
import { loadConfig } from '../config';
import { errorMessage } from '../core/errors';

const DEFAULT_DAYS = 365;

function parseDays(argv: string[]): number {
  const index = argv.indexOf('--days');
  if (index === -1) return DEFAULT_DAYS;
  const raw = argv[index + 1];
  const days = Number(raw);
  if (raw === undefined || !Number.isInteger(days) || days < 0) {
    throw new RangeError(`--days expects a non-negative integer, got '${raw ?? ''}'`);
  }
  return days;
}

async function pruneWords() {
  const days = parseDays(process.argv.slice(2));
  const config = loadConfig();
  const wordStore = new SQLiteWordStore(config.database.path);

  try {
    const removed = await wordStore.pruneOlderThan(days);
    console.log(`Removed ${removed} word(s) sent ${days} or more days ago.`);
  } finally {
    await wordStore.close();
  }
}

pruneWords().catch((error) => {
  console.error(`Prune failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
