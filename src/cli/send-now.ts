#!/usr/bin/env node

import { buildApplication } from '../bootstrap';
import { ConfigInvalidError, errorMessage } from '../core/errors';

async function sendNow(dryRun: boolean) {
  const app = buildApplication();

  try {
    if (dryRun) {
      console.log('Dry run: nothing will be sent or recorded.\n');
      const preview = await app.useCase.preview();
      console.log(`To: ${preview.recipient}`);
      console.log(`Subject: ${preview.email.subject}\n`);
      console.log(preview.email.text);
      return;
    }

    const result = await app.useCase.execute();
    console.log(`Sent ${result.words.length} word(s) to ${result.recipient} via ${result.receipt.transport}:`);
    result.words.forEach((word, index) => {
      console.log(`${index + 1}. ${word.term} (${word.source})`);
    });
  } finally {
    await app.close();
  }
}

sendNow(process.argv.includes('--dry-run')).catch((error) => {
  console.error(`Send failed: ${errorMessage(error)}`);
  if (error instanceof ConfigInvalidError) {
    error.errors.forEach((e) => console.error(`  - ${e}`));
  }
  process.exitCode = 1;
});
