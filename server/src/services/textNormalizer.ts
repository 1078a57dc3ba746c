import { z } from 'zod';
import rawAbbreviations from '../data/abbreviations.json';

type NormalizeOptions = {
  lowercase: boolean;
  removePunctuation: boolean;
  expandAbbreviations: boolean;
  abbreviations?: ReadonlyMap<string, string>;
};

type NormalizationResult = {
  text: string;
  fellBack: boolean;
  error?: string;
};

export const MEDICAL_ABBREVIATIONS: ReadonlyMap<string, string> = new Map(
  Object.entries(z.record(z.string()).parse(rawAbbreviations)).map(([abbr, expansion]) => [abbr.toLowerCase(), expansion])
);

// ASCII punctuation only
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;
const SENTENCE_PLACEHOLDER = '\u0000POINT\u0000';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildAbbreviationPattern(abbreviations: ReadonlyMap<string, string>): RegExp | null {
  if (abbreviations.size === 0) return null;
  // Longest first so "lap chole" wins over "lap" and "w/o" over "w/".
  const alternatives = Array.from(abbreviations.keys())
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  return new RegExp(`(?<![a-z0-9])(?:${alternatives.join('|')})(?![a-z0-9])`, 'gi');
}

const DEFAULT_PATTERN = buildAbbreviationPattern(MEDICAL_ABBREVIATIONS);

export function cleanText(text: string, lowercase = true): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return lowercase ? collapsed.toLowerCase() : collapsed;
}

export function expandAbbreviations(text: string, abbreviations: ReadonlyMap<string, string> = MEDICAL_ABBREVIATIONS): string {
  const pattern = abbreviations === MEDICAL_ABBREVIATIONS ? DEFAULT_PATTERN : buildAbbreviationPattern(abbreviations);
  if (!pattern) return text;
  return text.replace(pattern, (match) => abbreviations.get(match.toLowerCase()) ?? match);
}

export function removePunctuation(text: string): string {
  return text.replace(PUNCTUATION, '');
}

/**
 * Cleans a clinical note for matching: whitespace collapse, optional lowercasing,
 * abbreviation expansion, then punctuation stripping.
 *
 * Fails open. Any internal error is logged and the original text comes back with
 * `fellBack` set, so callers can still run the rule engine on it.
 */
export function normalizeClinicalText(text: string, options: NormalizeOptions): NormalizationResult {
  try {
    let normalized = cleanText(text, options.lowercase);
    if (options.expandAbbreviations) {
      normalized = expandAbbreviations(normalized, options.abbreviations);
    }
    if (options.removePunctuation) {
      normalized = removePunctuation(normalized);
    }
    return { text: normalized, fellBack: false };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn('[normalizer] normalization failed, using original text', message);
    return { text, fellBack: true, error: message };
  }
}

export function preprocessText(text: string, options: NormalizeOptions): string {
  return normalizeClinicalText(text, options).text;
}

/**
 * Sentence split that leaves single-letter initials ("J. Smith"), title-case
 * abbreviations ("Dr. Lee") and personal titles in lowercased notes ("dr. lee")
 * inside their sentence.
 */
export function segmentSentences(text: string): string[] {
  const guarded = text.replace(/(\b[A-Za-z]\.)(\s)/g, `$1${SENTENCE_PLACEHOLDER}$2`);
  return guarded
    .split(/(?<!\w\.\w.)(?<![A-Z][a-z]\.)(?<!\b(?:[Dd]r|[Mm]rs?|[Mm]s|[Pp]rof)\.)(?<=[.?!])\s/)
    .map((sentence) => sentence.split(SENTENCE_PLACEHOLDER).join('').trim())
    .filter(Boolean);
}

export type { NormalizeOptions, NormalizationResult };
