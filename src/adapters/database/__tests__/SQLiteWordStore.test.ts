import fs from 'fs';
import path from 'path';
import { SqlParams } from '../SQLiteRepository';
import { SQLiteSettingsRepository } from '../SQLiteSettingsRepository';
import { SQLiteWordStore } from '../SQLiteWordStore';
import { StorageUnavailableError } from '../../../core/errors';
import { createTempDir, removeDir, word } from '../../../test/helpers';

const DAY_MS = 24 * 60 * 60 * 1000;

// Fails the nth INSERT so a batch breaks halfway through its transaction
class FailingInsertStore extends SQLiteWordStore {
  private inserts = 0;

  constructor(dbPath: string, private readonly failAt: number) {
    super(dbPath);
  }

  protected async run(operation: string, sql: string, params: SqlParams = []): Promise<number> {
    if (sql.startsWith('INSERT') && ++this.inserts === this.failAt) {
      throw new StorageUnavailableError(operation, { cause: new Error('disk I/O error') });
    }
    return super.run(operation, sql, params);
  }
}

describe('SQLiteWordStore Integration Tests', () => {
  let dir: string;
  let dbPath: string;
  let store: SQLiteWordStore;

  beforeEach(() => {
    dir = createTempDir();
    dbPath = path.join(dir, 'vocabulary.db');
    store = new SQLiteWordStore(dbPath);
  });

  afterEach(async () => {
    await store.close();
    removeDir(dir);
  });

  describe('recordSent / contains', () => {
    it('should contain every recorded term', async () => {
      const inserted = await store.recordSent([word('ephemeral'), word('lucid')]);

      expect(inserted).toBe(2);
      expect(await store.contains('ephemeral')).toBe(true);
      expect(await store.contains('lucid')).toBe(true);
      expect(await store.contains('candid')).toBe(false);
    });

    it('should match terms case-insensitively', async () => {
      await store.recordSent([word('Ephemeral')]);

      expect(await store.contains('EPHEMERAL')).toBe(true);
      expect(await store.contains(' ephemeral ')).toBe(true);
    });

    it('should be idempotent for a term sent twice', async () => {
      await store.recordSent([word('lucid')]);
      const countAfterFirst = await store.countSent();

      const second = await store.recordSent([word('lucid', { definition: 'Another definition' })]);

      expect(second).toBe(0);
      expect(await store.countSent()).toBe(countAfterFirst);
    });

    it('should skip duplicates within one batch', async () => {
      const inserted = await store.recordSent([word('lucid'), word('LUCID'), word('candid')]);

      expect(inserted).toBe(2);
      expect(await store.countSent()).toBe(2);
    });

    it('should return 0 for an empty batch', async () => {
      expect(await store.recordSent([])).toBe(0);
    });

    it('should persist the word details and timestamp', async () => {
      const sentAt = new Date('2026-10-01T09:00:00.000Z');
      await store.recordSent([word('lucid', { definition: 'Easy to understand', example: 'A lucid talk.' })], sentAt);

      const [record] = await store.recent(1);

      expect(record.term).toBe('lucid');
      expect(record.definition).toBe('Easy to understand');
      expect(record.partOfSpeech).toBe('adjective');
      expect(record.example).toBe('A lucid talk.');
      expect(record.sentAt).toEqual(sentAt);
    });
  });

  describe('findUnsent', () => {
    it('should keep input order and drop sent terms and duplicates', async () => {
      await store.recordSent([word('ephemeral')]);

      const unsent = await store.findUnsent(['Lucid', 'ephemeral', 'candid', 'lucid', ' ']);

      expect(unsent).toEqual(['lucid', 'candid']);
    });

    it('should return an empty list for no input', async () => {
      expect(await store.findUnsent([])).toEqual([]);
    });
  });

  describe('pruneOlderThan', () => {
    it('should remove everything for 0 days', async () => {
      await store.recordSent([word('ephemeral'), word('lucid')], new Date(Date.now() - 1000));

      const removed = await store.pruneOlderThan(0);

      expect(removed).toBe(2);
      expect(await store.countSent()).toBe(0);
      expect(await store.contains('ephemeral')).toBe(false);
    });

    it('should remove nothing for a huge number of days', async () => {
      await store.recordSent([word('ephemeral'), word('lucid')]);

      expect(await store.pruneOlderThan(36500)).toBe(0);
      expect(await store.countSent()).toBe(2);
    });

    it('should remove only records at or before the cutoff', async () => {
      await store.recordSent([word('ephemeral')], new Date(Date.now() - 40 * DAY_MS));
      await store.recordSent([word('lucid')], new Date(Date.now() - DAY_MS));

      expect(await store.pruneOlderThan(30)).toBe(1);
      expect(await store.contains('ephemeral')).toBe(false);
      expect(await store.contains('lucid')).toBe(true);
    });

    it.each([-1, 1.5, Number.NaN])('should reject %p days', async (days) => {
      await expect(store.pruneOlderThan(days)).rejects.toThrow(RangeError);
    });
  });

  describe('reset', () => {
    it('should delete all records and report how many', async () => {
      await store.recordSent([word('ephemeral'), word('lucid'), word('candid')]);

      expect(await store.reset()).toBe(3);
      expect(await store.countSent()).toBe(0);
    });
  });

  describe('recent', () => {
    it('should list newest first', async () => {
      await store.recordSent([word('ephemeral')], new Date('2026-10-01T09:00:00Z'));
      await store.recordSent([word('lucid')], new Date('2026-10-03T09:00:00Z'));
      await store.recordSent([word('candid')], new Date('2026-10-02T09:00:00Z'));

      const recent = await store.recent(2);

      expect(recent.map((r) => r.term)).toEqual(['lucid', 'candid']);
    });
  });

  describe('info', () => {
    it('should report an empty store', async () => {
      const info = await store.info();

      expect(info.count).toBe(0);
      expect(info.oldest).toBeNull();
      expect(info.newest).toBeNull();
      expect(info.sentToday).toBe(0);
      expect(info.databasePath).toBe(dbPath);
    });

    it('should report counts and the sent range', async () => {
      const old = new Date(Date.now() - 10 * DAY_MS);
      const now = new Date();
      await store.recordSent([word('ephemeral')], old);
      await store.recordSent([word('lucid'), word('candid')], now);

      const info = await store.info();

      expect(info.count).toBe(3);
      expect(info.oldest).toEqual(old);
      expect(info.newest).toEqual(now);
      expect(info.sentToday).toBe(2);
      expect(info.sizeBytes).toBeGreaterThan(0);
    });
  });

  describe('backupTo', () => {
    it('should write a snapshot that opens as a word store', async () => {
      await store.recordSent([word('ephemeral'), word('lucid')]);
      const backupPath = path.join(dir, 'backups', 'snapshot.db');

      await store.backupTo(backupPath);

      expect(fs.existsSync(backupPath)).toBe(true);
      const restored = new SQLiteWordStore(backupPath);
      try {
        expect(await restored.countSent()).toBe(2);
        expect(await restored.contains('lucid')).toBe(true);
      } finally {
        await restored.close();
      }
    });
  });

  describe('shared connections', () => {
    it('should keep working for one store after another on the same file closes', async () => {
      const other = new SQLiteWordStore(dbPath);
      await other.recordSent([word('lucid')]);
      await other.close();

      expect(await store.contains('lucid')).toBe(true);
    });

    it('should queue transactions from repositories sharing the file', async () => {
      const settings = new SQLiteSettingsRepository(dbPath);
      try {
        const [first, , second] = await Promise.all([
          store.recordSent([word('ephemeral'), word('lucid')]),
          settings.setMany({ BOT_NAME: 'Word Bot', WORDS_PER_DAY: '3' }),
          store.recordSent([word('candid')]),
        ]);

        expect(first).toBe(2);
        expect(second).toBe(1);
        expect(await store.countSent()).toBe(3);
        expect(await settings.getAll()).toEqual({ BOT_NAME: 'Word Bot', WORDS_PER_DAY: '3' });
      } finally {
        await settings.close();
      }
    });
  });

  describe('failures', () => {
    it('should record nothing from a batch that fails partway', async () => {
      const failing = new FailingInsertStore(dbPath, 2);
      try {
        await expect(
          failing.recordSent([word('ephemeral'), word('lucid'), word('candid')])
        ).rejects.toBeInstanceOf(StorageUnavailableError);

        expect(await store.countSent()).toBe(0);
        expect(await store.contains('ephemeral')).toBe(false);
        expect(await store.contains('lucid')).toBe(false);
      } finally {
        await failing.close();
      }
    });

    it('should accept the next batch after a rolled-back one', async () => {
      const failing = new FailingInsertStore(dbPath, 1);
      try {
        await expect(failing.recordSent([word('ephemeral')])).rejects.toBeInstanceOf(StorageUnavailableError);

        expect(await failing.recordSent([word('ephemeral'), word('lucid')])).toBe(2);
        expect(await store.countSent()).toBe(2);
      } finally {
        await failing.close();
      }
    });

    it('should raise StorageUnavailableError when the file cannot be opened', async () => {
      const blocker = path.join(dir, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');
      const broken = new SQLiteWordStore(path.join(blocker, 'vocabulary.db'));
      try {
        await expect(broken.countSent()).rejects.toBeInstanceOf(StorageUnavailableError);
      } finally {
        await broken.close();
      }
    });
  });
});
