import fs from 'fs';
import os from 'os';
import path from 'path';
import { VocabularyWord } from '../core/entities/WordRecord';
import { Logger } from '../core/services/Logger';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    time: jest.fn(),
    timeEnd: jest.fn().mockReturnValue(0),
    timeLog: jest.fn(),
  };
}

export function createTempDir(prefix = 'vocabulary-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function word(term: string, overrides: Partial<VocabularyWord> = {}): VocabularyWord {
  return {
    term,
    definition: `Definition of ${term}`,
    partOfSpeech: 'adjective',
    example: null,
    source: 'fallback',
    ...overrides,
  };
}

// Minimal environment that passes every delivery check over SMTP.
export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  RECIPIENT_EMAIL: 'reader@example.com',
  GMAIL_USER: 'bot@example.com',
  GMAIL_APP_PASSWORD: 'test-secret',
  WORDS_PER_DAY: '2',
  SCHEDULE_TIME: '09:00',
  EMAIL_SUBJECT_PREFIX: '',
};

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}
