import { sampleConfidence, type Codebooks, type ConfidenceRange, type Explanation, type RandomSource } from './types';

type ExplanationProfile = {
  keywords: readonly string[];
  confidenceRange: ConfidenceRange;
  featureImportance: Readonly<Record<string, number>>;
};

const MAX_RELEVANT_SENTENCES = 3;

const EXPLANATION_PROFILES: Readonly<Record<string, ExplanationProfile>> = {
  // NSTEMI
  'I21.4': {
    keywords: ['nstemi', 'non-st elevation', 'acute coronary syndrome', 'myocardial infarction', 'troponin', 'chest pain'],
    confidenceRange: [0.85, 0.95],
    featureImportance: {
      'troponin elevation': 0.35,
      'chest pain': 0.25,
      'ECG changes': 0.2,
      'clinical presentation': 0.15,
      'risk factors': 0.05,
    },
  },
  I10: {
    keywords: ['hypertension', 'high blood pressure', 'htn', 'elevated blood pressure'],
    confidenceRange: [0.8, 0.9],
    featureImportance: {
      'blood pressure readings': 0.4,
      'medication history': 0.3,
      'clinical history': 0.2,
      'risk factors': 0.1,
    },
  },
  'E11.9': {
    keywords: ['diabetes', 'type 2', 't2dm', 'hyperglycemia', 'glucose', 'hba1c'],
    confidenceRange: [0.8, 0.9],
    featureImportance: {
      'diabetes history': 0.35,
      'glucose levels': 0.25,
      HbA1c: 0.2,
      medications: 0.15,
      symptoms: 0.05,
    },
  },
  '93000': {
    keywords: ['ecg', 'ekg', 'electrocardiogram'],
    confidenceRange: [0.8, 0.9],
    featureImportance: {
      'procedure mention': 0.6,
      'clinical indication': 0.3,
      context: 0.1,
    },
  },
  // Coronary angiography
  '93454': {
    keywords: ['coronary angiography', 'angiogram', 'cardiac catheterization', 'cath'],
    confidenceRange: [0.85, 0.95],
    featureImportance: {
      'procedure mention': 0.5,
      'clinical indication': 0.3,
      context: 0.2,
    },
  },
  '80053': {
    keywords: ['comprehensive metabolic panel', 'cmp', 'metabolic panel'],
    confidenceRange: [0.8, 0.9],
    featureImportance: {
      'test mention': 0.6,
      'clinical indication': 0.25,
      context: 0.15,
    },
  },
};

const UNKNOWN_PROFILE: ExplanationProfile = {
  keywords: [],
  confidenceRange: [0.6, 0.7],
  featureImportance: { 'unknown factors': 1.0 },
};

function hasExplanationProfile(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(EXPLANATION_PROFILES, code);
}

function describe(code: string, codebooks: Codebooks): Pick<Explanation, 'description' | 'type'> {
  const icd10 = codebooks.icd10.get(code);
  if (icd10 !== undefined) return { description: icd10, type: 'ICD-10' };
  const cpt = codebooks.cpt.get(code);
  if (cpt !== undefined) return { description: cpt, type: 'CPT' };
  return { description: 'Unknown code', type: 'Unknown' };
}

/**
 * Ties a code back to the note. Sentences are a plain split on ".", unlike
 * segmentSentences, and the confidence is re-sampled rather than copied from any
 * earlier prediction.
 */
export function explainCode(text: string, code: string, codebooks: Codebooks, random: RandomSource = Math.random): Explanation {
  const profile = hasExplanationProfile(code) ? EXPLANATION_PROFILES[code] : UNKNOWN_PROFILE;
  const sentences = text
    .split('.')
    .map((sentence) => sentence.trim())
    .filter(Boolean);

  const relevant = sentences
    .filter((sentence) => {
      const lower = sentence.toLowerCase();
      return profile.keywords.some((keyword) => lower.includes(keyword));
    })
    .slice(0, MAX_RELEVANT_SENTENCES);

  return {
    code,
    ...describe(code, codebooks),
    confidence: sampleConfidence(profile.confidenceRange, random),
    relevant_text: relevant,
    feature_importance: { ...profile.featureImportance },
  };
}
