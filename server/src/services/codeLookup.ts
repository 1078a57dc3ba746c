import type { CodeType, Codebooks } from './types';

const ICD10_FORMAT = /^[A-Z]\d{2}(\.\d+)?$/;
const CPT_FORMAT = /^\d{5}$/;

const ICD10_CHAPTERS: Readonly<Record<string, string>> = {
  A: 'Certain infectious and parasitic diseases',
  B: 'Certain infectious and parasitic diseases',
  C: 'Neoplasms',
  D: 'Neoplasms / Diseases of the blood and blood-forming organs',
  E: 'Endocrine, nutritional and metabolic diseases',
  F: 'Mental and behavioral disorders',
  G: 'Diseases of the nervous system',
  H: 'Diseases of the eye and adnexa / Diseases of the ear and mastoid process',
  I: 'Diseases of the circulatory system',
  J: 'Diseases of the respiratory system',
  K: 'Diseases of the digestive system',
  L: 'Diseases of the skin and subcutaneous tissue',
  M: 'Diseases of the musculoskeletal system and connective tissue',
  N: 'Diseases of the genitourinary system',
  O: 'Pregnancy, childbirth and the puerperium',
  P: 'Certain conditions originating in the perinatal period',
  Q: 'Congenital malformations, deformations and chromosomal abnormalities',
  R: 'Symptoms, signs and abnormal clinical and laboratory findings',
  S: 'Injury, poisoning and certain other consequences of external causes',
  T: 'Injury, poisoning and certain other consequences of external causes',
  V: 'External causes of morbidity',
  W: 'External causes of morbidity',
  X: 'External causes of morbidity',
  Y: 'External causes of morbidity',
  Z: 'Factors influencing health status and contact with health services',
};

// Checked in order; E/M sits inside the Medicine block.
const CPT_SECTIONS: readonly { from: number; to: number; label: string }[] = [
  { from: 100, to: 1999, label: 'Anesthesia' },
  { from: 10000, to: 69999, label: 'Surgery' },
  { from: 70000, to: 79999, label: 'Radiology' },
  { from: 80000, to: 89999, label: 'Pathology and Laboratory' },
  { from: 99202, to: 99499, label: 'Evaluation and Management' },
  { from: 90000, to: 99999, label: 'Medicine' },
];

export function isValidIcd10(code: string): boolean {
  return ICD10_FORMAT.test(code);
}

export function isValidCpt(code: string): boolean {
  return CPT_FORMAT.test(code);
}

export function categorizeIcd10(code: string): string {
  if (!isValidIcd10(code)) return 'Invalid ICD-10 code';
  return ICD10_CHAPTERS[code.charAt(0)] ?? 'Unknown chapter';
}

export function categorizeCpt(code: string): string {
  if (!isValidCpt(code)) return 'Invalid CPT code';
  const value = Number.parseInt(code, 10);
  return CPT_SECTIONS.find((section) => value >= section.from && value <= section.to)?.label ?? 'Unknown category';
}

/** Standalone lookup: ICD-10 first, then CPT, else "Unknown code". */
export function describeCode(code: string, codebooks: Codebooks): string {
  return codebooks.icd10.get(code) ?? codebooks.cpt.get(code) ?? 'Unknown code';
}

type CodeSummary = {
  code: string;
  description: string;
  type: CodeType | 'Unknown';
  category: string;
  valid: boolean;
};

export function summarizeCode(code: string, codebooks: Codebooks): CodeSummary {
  const description = describeCode(code, codebooks);
  if (codebooks.icd10.has(code) || (!codebooks.cpt.has(code) && isValidIcd10(code))) {
    return { code, description, type: 'ICD-10', category: categorizeIcd10(code), valid: isValidIcd10(code) };
  }
  if (codebooks.cpt.has(code) || isValidCpt(code)) {
    return { code, description, type: 'CPT', category: categorizeCpt(code), valid: isValidCpt(code) };
  }
  return { code, description, type: 'Unknown', category: 'Unknown category', valid: false };
}

export type { CodeSummary };
