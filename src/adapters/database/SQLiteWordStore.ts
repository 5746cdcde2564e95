import fs from 'fs';
import path from 'path';
import { normalizeTerm, VocabularyWord, WordRecord } from '../../core/entities/WordRecord';
import { WordStore, WordStoreInfo } from '../../core/repositories/WordStore';
import { startOfDay } from '../../core/time';
import { SQLiteRepository } from './SQLiteRepository';

const DAY_MS = 24 * 60 * 60 * 1000;

type WordRow = {
  term: string;
  definition: string;
  part_of_speech: string | null;
  example: string | null;
  sent_at: number;
};

function toRecord(row: WordRow): WordRecord {
  return new WordRecord(row.term, row.definition, row.part_of_speech, row.example, new Date(row.sent_at));
}

export class SQLiteWordStore extends SQLiteRepository implements WordStore {
  constructor(private readonly dbPath: string) {
    super(dbPath);
  }

  async contains(term: string): Promise<boolean> {
    const row = await this.get<{ found: number }>(
      'contains',
      'SELECT 1 AS found FROM sent_words WHERE term = ?',
      [normalizeTerm(term)]
    );
    return row !== undefined;
  }

  async findUnsent(terms: string[]): Promise<string[]> {
    const unique = Array.from(new Set(terms.map(normalizeTerm).filter(Boolean)));
    if (unique.length === 0) return [];

    const placeholders = unique.map(() => '?').join(', ');
    const rows = await this.all<{ term: string }>(
      'findUnsent',
      `SELECT term FROM sent_words WHERE term IN (${placeholders})`,
      unique
    );
    const sent = new Set(rows.map((r) => r.term));
    return unique.filter((t) => !sent.has(t));
  }

  async recordSent(words: VocabularyWord[], sentAt: Date = new Date()): Promise<number> {
    if (words.length === 0) return 0;
    const records = words.map((w) => WordRecord.fromWord(w, sentAt));

    return this.transaction('recordSent', async () => {
      let inserted = 0;
      for (const record of records) {
        inserted += await this.run(
          'recordSent',
          'INSERT OR IGNORE INTO sent_words (term, definition, part_of_speech, example, sent_at) VALUES (?, ?, ?, ?, ?)',
          [record.term, record.definition, record.partOfSpeech, record.example, record.sentAt.getTime()]
        );
      }
      return inserted;
    });
  }

  async countSent(): Promise<number> {
    const row = await this.get<{ total: number }>('countSent', 'SELECT COUNT(*) AS total FROM sent_words');
    return row?.total ?? 0;
  }

  async countSentSince(since: Date): Promise<number> {
    const row = await this.get<{ total: number }>(
      'countSentSince',
      'SELECT COUNT(*) AS total FROM sent_words WHERE sent_at >= ?',
      [since.getTime()]
    );
    return row?.total ?? 0;
  }

  async recent(limit: number): Promise<WordRecord[]> {
    const rows = await this.all<WordRow>(
      'recent',
      'SELECT term, definition, part_of_speech, example, sent_at FROM sent_words ORDER BY sent_at DESC, term ASC LIMIT ?',
      [Math.max(0, Math.floor(limit))]
    );
    return rows.map(toRecord);
  }

  async pruneOlderThan(days: number): Promise<number> {
    if (!Number.isInteger(days) || days < 0) {
      throw new RangeError(`days must be a non-negative integer, got ${days}`);
    }
    const cutoff = Date.now() - days * DAY_MS;
    return this.run('pruneOlderThan', 'DELETE FROM sent_words WHERE sent_at <= ?', [cutoff]);
  }

  async reset(): Promise<number> {
    return this.run('reset', 'DELETE FROM sent_words');
  }

  // Consistent snapshot of the whole database file (settings included).
  async backupTo(destPath: string): Promise<void> {
    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    if (fs.existsSync(destPath)) throw new Error(`Backup target already exists: ${destPath}`);
    // VACUUM INTO takes no bound parameters
    const escaped = destPath.replace(/'/g, "''");
    await this.run('backup', `VACUUM INTO '${escaped}'`);
  }

  async info(): Promise<WordStoreInfo> {
    const row = await this.get<{ total: number; oldest: number | null; newest: number | null }>(
      'info',
      'SELECT COUNT(*) AS total, MIN(sent_at) AS oldest, MAX(sent_at) AS newest FROM sent_words'
    );
    const sentToday = await this.countSentSince(startOfDay(new Date()));

    return {
      count: row?.total ?? 0,
      oldest: row?.oldest != null ? new Date(row.oldest) : null,
      newest: row?.newest != null ? new Date(row.newest) : null,
      sentToday,
      databasePath: this.dbPath,
      sizeBytes: fs.existsSync(this.dbPath) ? fs.statSync(this.dbPath).size : 0,
    };
  }
}
