import { VocabularyWord, WordRecord } from '../entities/WordRecord';

export interface WordStoreInfo {
  count: number;
  oldest: Date | null;
  newest: Date | null;
  sentToday: number;
  databasePath: string;
  sizeBytes: number;
}

export interface WordStore {
  contains(term: string): Promise<boolean>;
  // Terms from the input that were never sent, normalised and de-duplicated
  findUnsent(terms: string[]): Promise<string[]>;
  // All-or-nothing; duplicates are skipped. Returns rows inserted.
  recordSent(words: VocabularyWord[], sentAt?: Date): Promise<number>;
  countSent(): Promise<number>;
  countSentSince(since: Date): Promise<number>;
  recent(limit: number): Promise<WordRecord[]>;
  pruneOlderThan(days: number): Promise<number>;
  reset(): Promise<number>;
  info(): Promise<WordStoreInfo>;
  close(): Promise<void>;
}
