import { z } from 'zod';
import rawTerms from '../data/medical-terms.json';

export const MEDICAL_TERMS: readonly string[] = Object.freeze(
  z
    .array(z.string().min(1))
    .parse(rawTerms)
    .map((term) => term.toLowerCase())
);

/**
 * Plain substring containment against the lowercased note. Overlapping terms all
 * match ("diabetes" and "type 2 diabetes" can both be present).
 */
export function extractKeyTerms(text: string, vocabulary: readonly string[] = MEDICAL_TERMS): ReadonlySet<string> {
  const lower = text.toLowerCase();
  return new Set(vocabulary.filter((term) => lower.includes(term)));
}
