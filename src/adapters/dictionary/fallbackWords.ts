import { z } from 'zod';
import { normalizeTerm } from '../../core/entities/WordRecord';
import rawFallbackWords from './fallback-words.json';

const fallbackWordSchema = z.object({
  term: z.string().min(1),
  partOfSpeech: z.string().min(1),
  definition: z.string().min(1),
  example: z.string().min(1),
});

export type FallbackWord = z.infer<typeof fallbackWordSchema>;

// Curated offline list; also the candidate pool for dictionary lookups.
export function loadFallbackWords(): FallbackWord[] {
  const words = z.array(fallbackWordSchema).parse(rawFallbackWords);
  const seen = new Set<string>();
  return words.filter((word) => {
    const key = normalizeTerm(word.term);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
