export interface SettingsRepository {
  getAll(): Promise<Record<string, string>>;
  // An empty value removes the key
  setMany(values: Record<string, string>): Promise<void>;
  close(): Promise<void>;
}
