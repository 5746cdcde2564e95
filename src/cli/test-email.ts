#!/usr/bin/env node

import { createMailer } from '../adapters/mail/createMailer';
import { buildApplication } from '../bootstrap';
import { VocabularyWord } from '../core/entities/WordRecord';
import { ConfigInvalidError, errorMessage } from '../core/errors';
import { VocabularyEmailComposer } from '../core/services/EmailComposer';

// Verifies the transport and sends one sample word; the word store is left untouched.
async function testEmail() {
  const app = buildApplication();

  try {
    const config = await app.configSource();
    const mailer = createMailer(config, app.logger);

    console.log(`Verifying ${mailer.transport} credentials...`);
    await mailer.verify();

    const reachable = await app.wordSource.checkConnection();
    console.log(`Dictionary API: ${reachable ? 'reachable' : 'unreachable, the offline list will be used'}`);

    const [sample] = await app.wordSource.fetch(1);
    const word: VocabularyWord = sample ?? {
      term: 'ephemeral',
      definition: 'Lasting for only a short time',
      partOfSpeech: 'adjective',
      example: 'The snow sculptures were ephemeral and melted by noon.',
      source: 'fallback',
    };

    const composer = new VocabularyEmailComposer(config.bot.name, config.bot.subjectPrefix);
    const email = composer.compose([word]);
    const receipt = await mailer.send({
      to: config.recipient.email,
      subject: `[Test] ${email.subject}`,
      text: email.text,
      html: email.html,
    });

    console.log(`Test email sent to ${config.recipient.email} via ${receipt.transport}.`);
  } finally {
    await app.close();
  }
}

testEmail().catch((error) => {
  console.error(`Test email failed: ${errorMessage(error)}`);
  if (error instanceof ConfigInvalidError) {
    error.errors.forEach((e) => console.error(`  - ${e}`));
  }
  process.exitCode = 1;
});
