import { afterEach, describe, expect, it, vi } from 'vitest';
import { fileURLToPath } from 'url';
import { CPT_PATTERNS, ICD10_PATTERNS } from '../src/services/codeRules';
import { CodebookRegistry, loadCodebook, loadCodebooks, parseCodebook } from '../src/services/codebooks';
import { fixturePath } from './helpers';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseCodebook', () => {
  it('reads code and description columns, including quoted values', () => {
    const codes = parseCodebook('code,description\nI10,Hypertension\n\nE11.9,"Diabetes, type 2"\n');
    expect(codes).toEqual(
      new Map([
        ['I10', 'Hypertension'],
        ['E11.9', 'Diabetes, type 2'],
      ])
    );
  });

  it('finds the columns by name in any order', () => {
    expect(parseCodebook('Description,Code\nHypertension,I10').get('I10')).toBe('Hypertension');
    expect(parseCodebook('CPT Code,Short Description\n93000,ECG').get('93000')).toBe('ECG');
  });

  it('falls back to the first two columns', () => {
    expect(parseCodebook('a,b\nX1,desc').get('X1')).toBe('desc');
  });

  it('skips rows with a single cell', () => {
    expect(parseCodebook('code,description\nI10\nE11.9,Diabetes').size).toBe(1);
  });

  it('returns an empty map for a header-only file', () => {
    expect(parseCodebook('code,description\n').size).toBe(0);
  });
});

describe('loadCodebook', () => {
  it('loads a CSV file', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const result = await loadCodebook(fixturePath('cpt_codes.csv'));
    expect(result.error).toBeUndefined();
    expect(result.codes).toEqual(
      new Map([
        ['93000', 'ECG with interpretation'],
        ['80053', 'Comprehensive metabolic panel'],
      ])
    );
  });

  it('returns an empty codebook when the file is missing', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const result = await loadCodebook(fixturePath('missing.csv'));
    expect(result.codes.size).toBe(0);
    expect(result.error).toEqual(expect.any(String));
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('ships reference data for every rule code', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const reference = (name: string) => fileURLToPath(new URL(`../data/reference/${name}`, import.meta.url));
    const { codebooks, errors } = await loadCodebooks({ icd10Path: reference('icd10_codes.csv'), cptPath: reference('cpt_codes.csv') });

    expect(errors).toEqual([]);
    for (const pattern of ICD10_PATTERNS) expect(codebooks.icd10.has(pattern.code)).toBe(true);
    for (const pattern of CPT_PATTERNS) expect(codebooks.cpt.has(pattern.code)).toBe(true);
  });
});

describe('CodebookRegistry', () => {
  it('swaps in a new snapshot on reload', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const registry = new CodebookRegistry({ icd10Path: fixturePath('icd10_codes.csv'), cptPath: fixturePath('cpt_codes.csv') });
    const before = registry.current;

    expect(await registry.reload()).toEqual({ icd10: 3, cpt: 2, errors: [] });
    expect(registry.current).not.toBe(before);
    expect(before.icd10.size).toBe(0);
    expect(registry.current.icd10.get('N18.2')).toBe('Chronic kidney disease, stage 2 (mild)');
  });

  it('keeps the codebook that loaded when the other fails', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const registry = new CodebookRegistry({ icd10Path: fixturePath('missing.csv'), cptPath: fixturePath('cpt_codes.csv') });

    const summary = await registry.reload();

    expect(summary.icd10).toBe(0);
    expect(summary.cpt).toBe(2);
    expect(summary.errors).toHaveLength(1);
  });
});
