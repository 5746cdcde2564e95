import { VocabularyWord } from '../entities/WordRecord';

export interface FetchWordsOptions {
  // Lets the source skip terms that were already sent
  isKnown?: (term: string) => Promise<boolean>;
}

export interface WordSource {
  readonly supportsFiltering: boolean;
  fetch(count: number, options?: FetchWordsOptions): Promise<VocabularyWord[]>;
  checkConnection(): Promise<boolean>;
}
