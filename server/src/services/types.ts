type CodeType = 'ICD-10' | 'CPT';

/** Which rule table(s) to run, as callers spell it on the wire. */
type CodeTypeSelector = 'icd10' | 'cpt' | 'both';

type Prediction = {
  code: string;
  type: CodeType;
  description: string;
  confidence: number;
};

type Explanation = {
  code: string;
  description: string;
  type: CodeType | 'Unknown';
  confidence: number;
  relevant_text: string[];
  feature_importance: Record<string, number>;
};

/** Read-only mapping from an exact code string to its description. */
type Codebook = ReadonlyMap<string, string>;

type Codebooks = {
  icd10: Codebook;
  cpt: Codebook;
};

type ConfidenceRange = readonly [min: number, max: number];

/** Returns a float in [0, 1), like Math.random. */
type RandomSource = () => number;

const CODE_TYPE_BY_SELECTOR: Record<Exclude<CodeTypeSelector, 'both'>, CodeType> = {
  icd10: 'ICD-10',
  cpt: 'CPT',
};

function sampleConfidence([min, max]: ConfidenceRange, random: RandomSource = Math.random): number {
  return min + random() * (max - min);
}

export { CODE_TYPE_BY_SELECTOR, sampleConfidence };
export type {
  CodeType,
  CodeTypeSelector,
  Prediction,
  Explanation,
  Codebook,
  Codebooks,
  ConfidenceRange,
  RandomSource,
};
