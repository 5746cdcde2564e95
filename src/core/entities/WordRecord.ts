export type WordOrigin = 'api' | 'fallback';

// A candidate word produced by a word source, not yet sent.
export interface VocabularyWord {
  term: string;
  definition: string;
  partOfSpeech: string | null;
  example: string | null;
  source: WordOrigin;
}

export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase();
}

export class WordRecord {
  constructor(
    public readonly term: string,
    public readonly definition: string,
    public readonly partOfSpeech: string | null,
    public readonly example: string | null,
    public readonly sentAt: Date
  ) {}

  static fromWord(word: VocabularyWord, sentAt: Date = new Date()): WordRecord {
    return new WordRecord(
      normalizeTerm(word.term),
      word.definition.trim(),
      word.partOfSpeech?.trim() || null,
      word.example?.trim() || null,
      sentAt
    );
  }
}
