#!/usr/bin/env node

import path from 'path';
import { SQLiteWordStore } from '../adapters/database/SQLiteWordStore';
import { loadConfig } from '../config';
import { errorMessage } from '../core/errors';

function timestamp() {
  const d = new Date();
  const pad = (n: number) => n.toString().padStart(2, '0');
  return (
    d.getFullYear().toString() +
    pad(d.getMonth() + 1) +
    pad(d.getDate()) + '-' +
    pad(d.getHours()) +
    pad(d.getMinutes()) +
    pad(d.getSeconds())
  );
}

async function backupDb() {
  const config = loadConfig();
  const srcPath = config.database.path;
  const destPath = path.join(path.dirname(srcPath), 'backups', `vocabulary-${timestamp()}.db`);

  console.log(`Backing up word store from: ${srcPath}`);
  console.log(`Backup destination: ${destPath}`);

  const wordStore = new SQLiteWordStore(srcPath);
  try {
    await wordStore.backupTo(destPath);
  } finally {
    await wordStore.close();
  }

  console.log('Backup completed successfully.');
}

backupDb().catch((error) => {
  console.error(`Backup failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
