import { CODE_TYPE_BY_SELECTOR, type CodeTypeSelector, type Prediction } from './types';

type RankOptions = {
  threshold: number;
  topK: number;
  codeType?: CodeTypeSelector;
};

/**
 * Type filter, then stable sort by confidence (ties keep input order), then threshold,
 * then top-k. The cut happens after filtering, never before.
 */
export function rankPredictions(predictions: readonly Prediction[], { threshold, topK, codeType = 'both' }: RankOptions): Prediction[] {
  const pool =
    codeType === 'both'
      ? [...predictions]
      : predictions.filter((prediction) => prediction.type === CODE_TYPE_BY_SELECTOR[codeType]);

  pool.sort((a, b) => b.confidence - a.confidence);

  const limit = Math.max(0, Math.floor(topK));
  return pool.filter((prediction) => prediction.confidence >= threshold).slice(0, limit);
}

export type { RankOptions };
