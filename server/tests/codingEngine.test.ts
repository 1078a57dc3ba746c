import { afterEach, describe, expect, it, vi } from 'vitest';
import { detectCodes, predictCodes, type DetectionRequest } from '../src/services/codingEngine';
import { ENTITY_TYPES } from '../src/services/entityExtraction';
import type { InferenceClient, InferenceRequest } from '../src/services/inferenceEndpoint';
import { DEFAULT_PREPROCESSING, SCENARIO_NOTE, TEST_CODEBOOKS, ThrowingAbbreviations, midpoint } from './helpers';

const context = { codebooks: TEST_CODEBOOKS, preprocessing: DEFAULT_PREPROCESSING };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('predictCodes', () => {
  it('predicts the codes a cardiology note supports', () => {
    const predictions = predictCodes(SCENARIO_NOTE, { threshold: 0.5, topK: 10, codeType: 'both' }, context);

    expect(predictions.map((p) => [p.code, p.type]).sort()).toEqual([
      ['93000', 'CPT'],
      ['E11.9', 'ICD-10'],
      ['I10', 'ICD-10'],
      ['R06.02', 'ICD-10'],
      ['R07.9', 'ICD-10'],
    ]);
    expect(predictions.some((p) => p.code === 'K21.9')).toBe(false);
  });

  it('returns confidences in non-increasing order, all above the threshold', () => {
    for (let i = 0; i < 20; i++) {
      const predictions = predictCodes(SCENARIO_NOTE, { threshold: 0.75, topK: 10, codeType: 'both' }, context);
      predictions.forEach((prediction, index) => {
        expect(prediction.confidence).toBeGreaterThanOrEqual(0.75);
        if (index > 0) expect(prediction.confidence).toBeLessThanOrEqual(predictions[index - 1].confidence);
      });
    }
  });

  it('never returns more than top-k predictions', () => {
    for (let k = 0; k <= 6; k++) {
      expect(predictCodes(SCENARIO_NOTE, { threshold: 0, topK: k, codeType: 'both' }, context).length).toBeLessThanOrEqual(k);
    }
  });

  it('returns nothing for notes without known terms', () => {
    for (const threshold of [0, 0.5, 1]) {
      expect(predictCodes('Routine follow-up visit, no complaints.', { threshold, topK: 10, codeType: 'both' }, context)).toEqual([]);
    }
  });

  it('uses codebook descriptions when the code is loaded', () => {
    const predictions = predictCodes(SCENARIO_NOTE, { threshold: 0, topK: 10, codeType: 'both' }, context);
    const descriptions = Object.fromEntries(predictions.map((p) => [p.code, p.description]));
    expect(descriptions.I10).toBe('Hypertension (fixture)');
    expect(descriptions['93000']).toBe('ECG with interpretation');
    expect(descriptions['R07.9']).toBe('Chest pain, unspecified');
  });

  it('orders by sampled confidence', () => {
    const options = { threshold: 0.8, topK: 10, codeType: 'both' } as const;
    const predictions = predictCodes(SCENARIO_NOTE, options, { ...context, random: midpoint });
    expect(predictions.map((p) => p.code)).toEqual(['I10', 'E11.9', '93000']);
  });

  it('limits predictions to the requested code type', () => {
    const predictions = predictCodes(SCENARIO_NOTE, { threshold: 0.5, topK: 10, codeType: 'cpt' }, context);
    expect(predictions.map((p) => p.code)).toEqual(['93000']);
  });

  it('expands abbreviations before matching rules', () => {
    const predictions = predictCodes(
      'Pt w/ CKD stage 2, on IV fluids.',
      { threshold: 0.5, topK: 10, codeType: 'both' },
      { ...context, random: midpoint }
    );
    expect(predictions.map((p) => p.code)).toEqual(['N18.2', 'N18.9', '96365']);
  });
});

describe('detectCodes', () => {
  const request: DetectionRequest = {
    text: SCENARIO_NOTE,
    threshold: 0.5,
    topK: 10,
    codeType: 'both',
    entityTypes: ['DIAGNOSIS', 'SYMPTOM'],
    maxLength: 3,
  };

  function fakeClient(predict: InferenceClient['predict']): InferenceClient {
    return { endpointName: 'test-endpoint', predict };
  }

  it('runs the local rules without an inference client', async () => {
    const result = await detectCodes(request, context);

    expect(result.engine).toBe('rule-based');
    expect(result.predictions).toHaveLength(5);
    expect(result.entities).toEqual({ DIAGNOSIS: ['chest pain and shortness of breath'], SYMPTOM: [] });
    expect(result.debug).toEqual({ fallbackUsed: false, endpoint: undefined, normalizationFailed: false });
  });

  it('ranks and re-describes remote predictions', async () => {
    const calls: InferenceRequest[] = [];
    const inference = fakeClient(async (body) => {
      calls.push(body);
      return [
        { code: 'I10', type: 'ICD-10', confidence: 0.6 },
        { code: 'J45.909', type: 'ICD-10', description: 'Asthma', confidence: 0.95 },
        { code: '93000', type: 'CPT', confidence: 0.3 },
        { code: 'Q99.9', type: 'ICD-10', confidence: 0.7 },
      ];
    });

    const result = await detectCodes(request, { ...context, inference });

    expect(result.engine).toBe('remote-endpoint');
    expect(result.predictions).toEqual([
      { code: 'J45.909', type: 'ICD-10', description: 'Asthma', confidence: 0.95 },
      { code: 'Q99.9', type: 'ICD-10', description: 'Unknown', confidence: 0.7 },
      { code: 'I10', type: 'ICD-10', description: 'Hypertension (fixture)', confidence: 0.6 },
    ]);
    expect(result.debug).toEqual({ fallbackUsed: false, endpoint: 'test-endpoint', normalizationFailed: false });
    expect(calls).toEqual([{ text: 'patient presents with', threshold: 0.5, top_k: 10, code_type: 'both' }]);
  });

  it('falls back to the local rules when the endpoint fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const inference = fakeClient(async () => {
      throw new Error('endpoint unavailable');
    });

    const result = await detectCodes(request, { ...context, inference });

    expect(result.engine).toBe('rule-based');
    expect(result.debug.fallbackUsed).toBe(true);
    expect(result.debug.endpoint).toBe('test-endpoint');
    expect(result.predictions.map((p) => p.code).sort()).toEqual(['93000', 'E11.9', 'I10', 'R06.02', 'R07.9']);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('answers promptly for a long note', async () => {
    const started = performance.now();
    const result = await detectCodes({ ...request, text: `Chest pain ${'for '.repeat(16384)}`, entityTypes: ENTITY_TYPES }, context);
    const elapsed = performance.now() - started;

    expect(result.predictions.map((p) => p.code)).toEqual(['R07.9']);
    expect(elapsed).toBeLessThan(2000);
  });

  it('reports a normalization failure and still predicts from the original text', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const preprocessing = { ...DEFAULT_PREPROCESSING, abbreviations: new ThrowingAbbreviations([['htn', 'hypertension']]) };

    const result = await detectCodes({ ...request, text: 'Pt has HTN' }, { codebooks: TEST_CODEBOOKS, preprocessing });

    expect(result.debug.normalizationFailed).toBe(true);
    expect(result.predictions.map((p) => p.code)).toEqual(['I10']);
  });
});
