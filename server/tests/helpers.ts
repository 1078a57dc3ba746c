import { fileURLToPath } from 'url';
import { DEFAULT_CONFIG, toNormalizeOptions } from '../src/config';
import type { Codebooks } from '../src/services/types';

export const SCENARIO_NOTE =
  'Patient presents with chest pain and shortness of breath. ECG shows ST depression. History of hypertension and type 2 diabetes.';

export const DEFAULT_PREPROCESSING = toNormalizeOptions(DEFAULT_CONFIG.preprocessing);

export const EMPTY_CODEBOOKS: Codebooks = { icd10: new Map(), cpt: new Map() };

export const TEST_CODEBOOKS: Codebooks = {
  icd10: new Map([
    ['I10', 'Hypertension (fixture)'],
    ['E11.9', 'Type 2 diabetes mellitus without complications'],
    ['N18.2', 'Chronic kidney disease, stage 2 (mild)'],
  ]),
  cpt: new Map([
    ['93000', 'ECG with interpretation'],
    ['80053', 'Comprehensive metabolic panel'],
  ]),
};

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export const midpoint = () => 0.5;

/** Abbreviation table whose lookups blow up, to drive the normalizer's fallback path. */
export class ThrowingAbbreviations extends Map<string, string> {
  get(): string | undefined {
    throw new Error('lookup failed');
  }
}
