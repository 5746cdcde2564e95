import { SettingsRepository } from '../../core/repositories/SettingsRepository';
import { SQLiteRepository } from './SQLiteRepository';

export class SQLiteSettingsRepository extends SQLiteRepository implements SettingsRepository {
  async getAll(): Promise<Record<string, string>> {
    const rows = await this.all<{ key: string; value: string }>(
      'settings.getAll',
      'SELECT key, value FROM settings ORDER BY key'
    );
    const out: Record<string, string> = {};
    for (const row of rows) out[row.key] = row.value;
    return out;
  }

  async setMany(values: Record<string, string>): Promise<void> {
    const entries = Object.entries(values);
    if (entries.length === 0) return;
    const now = Date.now();

    await this.transaction('settings.setMany', async () => {
      for (const [key, value] of entries) {
        if (value === '') {
          await this.run('settings.setMany', 'DELETE FROM settings WHERE key = ?', [key]);
        } else {
          await this.run(
            'settings.setMany',
            `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
             ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
            [key, value, now]
          );
        }
      }
    });
  }
}
