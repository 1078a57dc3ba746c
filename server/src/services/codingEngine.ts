import { evaluateRules } from './codeRules';
import { extractEntities, filterEntities, normalizeEntities, type EntityMap } from './entityExtraction';
import type { InferenceClient, RemotePrediction } from './inferenceEndpoint';
import { extractKeyTerms } from './keyTerms';
import { rankPredictions } from './ranking';
import { normalizeClinicalText, type NormalizeOptions } from './textNormalizer';
import type { CodeTypeSelector, Codebooks, Prediction, RandomSource } from './types';

type PredictionOptions = {
  threshold: number;
  topK: number;
  codeType: CodeTypeSelector;
};

type EngineContext = {
  codebooks: Codebooks;
  preprocessing: NormalizeOptions;
  random?: RandomSource;
};

type DetectionRequest = PredictionOptions & {
  text: string;
  entityTypes: readonly string[];
  /** Word cap on the text sent to a remote endpoint. */
  maxLength: number;
};

type DetectionResponse = {
  engine: 'remote-endpoint' | 'rule-based';
  predictions: Prediction[];
  entities: EntityMap;
  debug: {
    fallbackUsed: boolean;
    endpoint?: string;
    normalizationFailed: boolean;
  };
};

/** Normalizer → key terms → rule tables → ranker, all local and synchronous. */
export function predictCodes(text: string, options: PredictionOptions, context: EngineContext): Prediction[] {
  const { text: normalized } = normalizeClinicalText(text, context.preprocessing);
  return predictFromNormalized(normalized, options, context);
}

function predictFromNormalized(normalized: string, options: PredictionOptions, context: EngineContext): Prediction[] {
  const keyTerms = extractKeyTerms(normalized);
  const candidates = evaluateRules(normalized, keyTerms, options.codeType, context.codebooks, context.random);
  return rankPredictions(candidates, options);
}

function truncateWords(text: string, maxWords: number): string {
  const words = text.split(' ');
  return words.length > maxWords ? words.slice(0, maxWords).join(' ') : text;
}

function describeRemote(prediction: RemotePrediction, codebooks: Codebooks): Prediction {
  const codebook = prediction.type === 'ICD-10' ? codebooks.icd10 : codebooks.cpt;
  return {
    code: prediction.code,
    type: prediction.type,
    description: codebook.get(prediction.code) ?? prediction.description ?? 'Unknown',
    confidence: prediction.confidence,
  };
}

async function callEndpoint(
  client: InferenceClient,
  normalized: string,
  request: DetectionRequest,
  codebooks: Codebooks
): Promise<Prediction[] | null> {
  try {
    const remote = await client.predict({
      text: truncateWords(normalized, request.maxLength),
      threshold: request.threshold,
      top_k: request.topK,
      code_type: request.codeType,
    });
    return remote.map((prediction) => describeRemote(prediction, codebooks));
  } catch (error) {
    console.error(`[inference] endpoint ${client.endpointName} failed, using rule-based fallback`, error);
    return null;
  }
}

/**
 * Serves a prediction request. With an inference client the remote endpoint is tried
 * first; any failure there falls back to the local rules instead of surfacing.
 */
export async function detectCodes(
  request: DetectionRequest,
  context: EngineContext & { inference?: InferenceClient }
): Promise<DetectionResponse> {
  const normalization = normalizeClinicalText(request.text, context.preprocessing);
  const normalized = normalization.text;
  const entities = normalizeEntities(filterEntities(extractEntities(normalized, request.entityTypes)));

  const remote = context.inference ? await callEndpoint(context.inference, normalized, request, context.codebooks) : null;
  const predictions = remote
    ? rankPredictions(remote, request)
    : predictFromNormalized(normalized, request, context);

  return {
    engine: remote ? 'remote-endpoint' : 'rule-based',
    predictions,
    entities,
    debug: {
      fallbackUsed: Boolean(context.inference) && !remote,
      endpoint: context.inference?.endpointName,
      normalizationFailed: normalization.fellBack,
    },
  };
}

export type { DetectionRequest, DetectionResponse, EngineContext, PredictionOptions };
