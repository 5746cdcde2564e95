import { z } from 'zod';
import { normalizeTerm, VocabularyWord } from '../../core/entities/WordRecord';
import { errorMessage, SourceUnavailableError } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { FetchWordsOptions, WordSource } from '../../core/services/WordSource';
import { FetchFn } from '../http';
import { FallbackWord, loadFallbackWords } from './fallbackWords';

export interface DictionaryApiOptions {
  apiUrl: string;
  timeoutMs: number;
  maxDefinitionLength: number;
  maxFailures: number;
}

const definitionSchema = z.object({
  definition: z.string(),
  example: z.string().optional(),
});

const entrySchema = z.object({
  word: z.string(),
  meanings: z
    .array(
      z.object({
        partOfSpeech: z.string().optional(),
        definitions: z.array(definitionSchema).min(1),
      })
    )
    .min(1),
});

const responseSchema = z.array(entrySchema).min(1);

interface DictionaryEntry {
  definition: string;
  partOfSpeech: string | null;
  example: string | null;
}

const PROBE_TERM = 'hello';

export class DictionaryApiWordSource implements WordSource {
  readonly supportsFiltering = true;

  constructor(
    private options: DictionaryApiOptions,
    private logger: Logger,
    private fetchFn: FetchFn = fetch,
    private random: () => number = Math.random,
    private fallbackWords: FallbackWord[] = loadFallbackWords()
  ) {}

  async fetch(count: number, options: FetchWordsOptions = {}): Promise<VocabularyWord[]> {
    if (count <= 0) return [];

    const picked: VocabularyWord[] = [];
    const chosen = new Set<string>();
    let consecutiveFailures = 0;

    for (const candidate of this.shuffle(this.fallbackWords)) {
      if (picked.length >= count) break;

      const term = normalizeTerm(candidate.term);
      if (chosen.has(term)) continue;
      if (options.isKnown && (await options.isKnown(term))) continue;
      chosen.add(term);

      if (consecutiveFailures >= this.options.maxFailures) {
        picked.push(fromFallback(term, candidate));
        continue;
      }

      try {
        const entry = await this.lookup(term);
        consecutiveFailures = 0;
        picked.push(this.merge(term, entry, candidate));
      } catch (error) {
        consecutiveFailures += 1;
        this.logger.warn(errorMessage(error));
        if (consecutiveFailures === this.options.maxFailures) {
          this.logger.warn(`Dictionary API failed ${consecutiveFailures} times in a row; using the offline list`);
        }
        picked.push(fromFallback(term, candidate));
      }
    }

    if (picked.length < count) {
      this.logger.warn(`Only ${picked.length} of ${count} requested words are available`);
    }
    return picked;
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.lookup(PROBE_TERM);
      this.logger.info('Dictionary API reachable');
      return true;
    } catch (error) {
      this.logger.warn(`Dictionary API check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async lookup(term: string): Promise<DictionaryEntry> {
    const url = `${this.options.apiUrl}/${encodeURIComponent(term)}`;

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(term, errorMessage(error), { cause: error });
    }
    if (!res.ok) throw new SourceUnavailableError(term, `HTTP ${res.status}`);

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new SourceUnavailableError(term, 'response is not JSON', { cause: error });
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) throw new SourceUnavailableError(term, 'unexpected response shape');

    const meaning = parsed.data[0].meanings[0];
    return {
      definition: meaning.definitions[0].definition.trim(),
      partOfSpeech: meaning.partOfSpeech?.trim() || null,
      example: meaning.definitions.find((d) => d.example?.trim())?.example?.trim() ?? null,
    };
  }

  // The curated definition wins over long or multi-clause API wording.
  private merge(term: string, entry: DictionaryEntry, curated: FallbackWord): VocabularyWord {
    const usable =
      entry.definition.length > 0 &&
      entry.definition.length <= this.options.maxDefinitionLength &&
      !entry.definition.includes(';');

    if (!usable) {
      this.logger.debug(`Using curated definition for '${term}'`);
      return {
        ...fromFallback(term, curated),
        partOfSpeech: entry.partOfSpeech ?? curated.partOfSpeech,
        example: entry.example ?? curated.example,
      };
    }

    return {
      term,
      definition: entry.definition,
      partOfSpeech: entry.partOfSpeech ?? curated.partOfSpeech,
      example: entry.example ?? curated.example,
      source: 'api',
    };
  }

  private shuffle<T>(items: T[]): T[] {
    const copy = [...items];
    for (let i = copy.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
  }
}

function fromFallback(term: string, word: FallbackWord): VocabularyWord {
  return {
    term,
    definition: word.definition,
    partOfSpeech: word.partOfSpeech,
    example: word.example,
    source: 'fallback',
  };
}
