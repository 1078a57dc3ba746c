import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import type { Codebook, Codebooks } from './types';

type CodebookLoadResult = {
  codes: Codebook;
  error?: string;
};

type CodebookPaths = {
  icd10Path: string;
  cptPath: string;
};

type ReloadSummary = {
  icd10: number;
  cpt: number;
  errors: string[];
};

const EMPTY_CODEBOOK: Codebook = new Map();

function pickColumns(header: string[]): { codeIndex: number; descriptionIndex: number } {
  const names = header.map((name) => name.trim().toLowerCase());
  if (names.includes('code') && names.includes('description')) {
    return { codeIndex: names.indexOf('code'), descriptionIndex: names.indexOf('description') };
  }
  const codeIndex = names.findIndex((name) => name.includes('code'));
  const descriptionIndex = names.findIndex((name) => name.includes('desc'));
  return {
    codeIndex: codeIndex === -1 ? 0 : codeIndex,
    descriptionIndex: descriptionIndex === -1 ? 1 : descriptionIndex,
  };
}

/** Parses a codebook CSV. The first row is always treated as the header. */
export function parseCodebook(content: string): Map<string, string> {
  const parsed = Papa.parse<string[]>(content, { skipEmptyLines: 'greedy' });
  const [header, ...rows] = parsed.data;
  const codes = new Map<string, string>();
  if (!header) return codes;

  const { codeIndex, descriptionIndex } = pickColumns(header);
  for (const row of rows) {
    if (row.length < 2) continue;
    const code = row[codeIndex]?.trim();
    const description = row[descriptionIndex]?.trim();
    if (!code || description === undefined) continue;
    codes.set(code, description);
  }
  return codes;
}

export async function loadCodebook(filePath: string): Promise<CodebookLoadResult> {
  try {
    const content = await readFile(filePath, 'utf8');
    const codes = parseCodebook(content);
    console.info(`[codebooks] Loaded ${codes.size} codes from ${filePath}`);
    return { codes };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[codebooks] Error loading codes from ${filePath}`, message);
    return { codes: EMPTY_CODEBOOK, error: message };
  }
}

export async function loadCodebooks({ icd10Path, cptPath }: CodebookPaths): Promise<{ codebooks: Codebooks; errors: string[] }> {
  const [icd10, cpt] = await Promise.all([loadCodebook(icd10Path), loadCodebook(cptPath)]);
  const errors = [icd10.error, cpt.error].filter((error): error is string => Boolean(error));
  return { codebooks: { icd10: icd10.codes, cpt: cpt.codes }, errors };
}

/**
 * Holds the process-wide codebooks. Request handlers read `current`; `reload` swaps in
 * a complete new pair, never mutating the maps a request may already be reading.
 */
export class CodebookRegistry {
  private snapshot: Codebooks;

  constructor(private readonly paths: CodebookPaths, initial: Codebooks = { icd10: EMPTY_CODEBOOK, cpt: EMPTY_CODEBOOK }) {
    this.snapshot = initial;
  }

  get current(): Codebooks {
    return this.snapshot;
  }

  async reload(): Promise<ReloadSummary> {
    const { codebooks, errors } = await loadCodebooks(this.paths);
    this.snapshot = codebooks;
    return { icd10: codebooks.icd10.size, cpt: codebooks.cpt.size, errors };
  }
}

export type { CodebookLoadResult, CodebookPaths, ReloadSummary };
