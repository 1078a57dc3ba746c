import {
  sampleConfidence,
  type CodeType,
  type CodeTypeSelector,
  type Codebooks,
  type ConfidenceRange,
  type Prediction,
  type RandomSource,
} from './types';

type CodePattern = {
  code: string;
  type: CodeType;
  description: string;
  /** Fires when any of these is in the key-term set... */
  terms: readonly string[];
  /** ...or any of these occurs in the lowercased note. */
  phrases?: readonly string[];
  /** Every one of these must also occur in the lowercased note. */
  requiredPhrases?: readonly string[];
  confidenceRange: ConfidenceRange;
};

const CKD_TERMS = ['chronic kidney disease', 'ckd'] as const;

export const ICD10_PATTERNS: readonly CodePattern[] = [
  {
    code: 'I21.4',
    type: 'ICD-10',
    description: 'Non-ST elevation myocardial infarction',
    terms: ['acute coronary syndrome', 'acs', 'nstemi', 'non-st elevation myocardial infarction'],
    confidenceRange: [0.85, 0.95],
  },
  {
    code: 'I21.3',
    type: 'ICD-10',
    description: 'ST elevation myocardial infarction of unspecified site',
    terms: ['stemi', 'st elevation myocardial infarction'],
    confidenceRange: [0.85, 0.95],
  },
  {
    code: 'I10',
    type: 'ICD-10',
    description: 'Essential (primary) hypertension',
    terms: ['hypertension', 'htn', 'high blood pressure'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: 'E11.9',
    type: 'ICD-10',
    description: 'Type 2 diabetes mellitus without complications',
    terms: ['diabetes', 'diabetes mellitus', 'type 2 diabetes', 't2dm'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: 'N18.9',
    type: 'ICD-10',
    description: 'Chronic kidney disease, unspecified',
    terms: CKD_TERMS,
    confidenceRange: [0.75, 0.85],
  },
  {
    // Emitted alongside N18.9, never instead of it.
    code: 'N18.2',
    type: 'ICD-10',
    description: 'Chronic kidney disease, stage 2 (mild)',
    terms: CKD_TERMS,
    requiredPhrases: ['stage 2'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: 'I50.9',
    type: 'ICD-10',
    description: 'Heart failure, unspecified',
    terms: ['heart failure', 'hf', 'chf'],
    confidenceRange: [0.75, 0.85],
  },
  {
    code: 'K21.9',
    type: 'ICD-10',
    description: 'Gastro-esophageal reflux disease without esophagitis',
    terms: ['gerd', 'gastroesophageal reflux disease'],
    confidenceRange: [0.7, 0.8],
  },
  {
    code: 'E78.5',
    type: 'ICD-10',
    description: 'Hyperlipidemia, unspecified',
    terms: ['hyperlipidemia', 'high cholesterol'],
    confidenceRange: [0.75, 0.85],
  },
  {
    code: 'R07.9',
    type: 'ICD-10',
    description: 'Chest pain, unspecified',
    terms: ['chest pain'],
    confidenceRange: [0.7, 0.8],
  },
  {
    code: 'R06.02',
    type: 'ICD-10',
    description: 'Shortness of breath',
    terms: ['shortness of breath', 'sob', 'dyspnea'],
    confidenceRange: [0.7, 0.8],
  },
];

export const CPT_PATTERNS: readonly CodePattern[] = [
  {
    code: '93000',
    type: 'CPT',
    description: 'Electrocardiogram complete',
    terms: ['electrocardiogram', 'ecg', 'ekg'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: '93306',
    type: 'CPT',
    description: 'Echocardiography complete with spectral and color flow Doppler',
    terms: ['echocardiogram', 'echo'],
    confidenceRange: [0.75, 0.85],
  },
  {
    code: '93454',
    type: 'CPT',
    description: 'Coronary angiography',
    terms: ['cardiac catheterization', 'cath', 'coronary angiography', 'angiogram'],
    confidenceRange: [0.85, 0.95],
  },
  {
    code: '71046',
    type: 'CPT',
    description: 'Chest X-ray 2 views',
    terms: ['chest x-ray', 'cxr'],
    confidenceRange: [0.75, 0.85],
  },
  {
    code: '80053',
    type: 'CPT',
    description: 'Comprehensive metabolic panel',
    terms: ['comprehensive metabolic panel', 'cmp'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: '80048',
    type: 'CPT',
    description: 'Basic metabolic panel',
    terms: ['basic metabolic panel', 'bmp'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: '80061',
    type: 'CPT',
    description: 'Lipid panel',
    terms: ['lipid panel', 'cholesterol'],
    confidenceRange: [0.75, 0.85],
  },
  {
    code: '85025',
    type: 'CPT',
    description: 'Complete CBC with auto diff WBC',
    terms: ['complete blood count', 'cbc'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: '84484',
    type: 'CPT',
    description: 'Troponin quantitative',
    terms: ['troponin', 'cardiac enzymes'],
    confidenceRange: [0.8, 0.9],
  },
  {
    code: '99223',
    type: 'CPT',
    description: 'Initial hospital care per day level 3',
    terms: [],
    phrases: ['admit', 'admission'],
    confidenceRange: [0.7, 0.8],
  },
  {
    code: '99291',
    type: 'CPT',
    description: 'Critical care first hour',
    terms: ['ccu', 'cardiac care unit'],
    phrases: ['critical care'],
    confidenceRange: [0.75, 0.85],
  },
  {
    code: '96365',
    type: 'CPT',
    description: 'IV infusion therapy initial up to 1 hour',
    terms: ['intravenous', 'iv infusion', 'iv fluids'],
    confidenceRange: [0.7, 0.8],
  },
];

function matchesPattern(pattern: CodePattern, keyTerms: ReadonlySet<string>, lower: string): boolean {
  const triggered =
    pattern.terms.some((term) => keyTerms.has(term)) ||
    (pattern.phrases ?? []).some((phrase) => lower.includes(phrase));
  if (!triggered) return false;
  return (pattern.requiredPhrases ?? []).every((phrase) => lower.includes(phrase));
}

function runPatterns(
  patterns: readonly CodePattern[],
  lower: string,
  keyTerms: ReadonlySet<string>,
  codebooks: Codebooks,
  random: RandomSource
): Prediction[] {
  const matches: Prediction[] = [];
  for (const pattern of patterns) {
    if (!matchesPattern(pattern, keyTerms, lower)) continue;
    const codebook = pattern.type === 'ICD-10' ? codebooks.icd10 : codebooks.cpt;
    matches.push({
      code: pattern.code,
      type: pattern.type,
      description: codebook.get(pattern.code) ?? pattern.description,
      confidence: sampleConfidence(pattern.confidenceRange, random),
    });
  }
  return matches;
}

/**
 * Evaluates every rule of the selected table(s) against one note. All matching rules
 * fire; the result is unordered. Confidence is drawn fresh from the rule's range on
 * every call, so identical notes can score differently.
 */
export function evaluateRules(
  text: string,
  keyTerms: ReadonlySet<string>,
  codeType: CodeTypeSelector,
  codebooks: Codebooks,
  random: RandomSource = Math.random
): Prediction[] {
  const lower = text.toLowerCase();
  const predictions: Prediction[] = [];
  if (codeType === 'icd10' || codeType === 'both') {
    predictions.push(...runPatterns(ICD10_PATTERNS, lower, keyTerms, codebooks, random));
  }
  if (codeType === 'cpt' || codeType === 'both') {
    predictions.push(...runPatterns(CPT_PATTERNS, lower, keyTerms, codebooks, random));
  }
  return predictions;
}

export type { CodePattern };
