import { readFile, writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { z } from 'zod';
import { env } from '../env';
import { loadConfig, toNormalizeOptions } from '../config';
import { loadCodebooks } from '../services/codebooks';
import { predictCodes } from '../services/codingEngine';
import { explainCode } from '../services/explainer';
import type { Explanation, Prediction, RandomSource } from '../services/types';

type CliIO = {
  log: (line: string) => void;
  random?: RandomSource;
};

export const USAGE = `Usage: npm run predict -- (--text "<note>" | --file note.txt) [--threshold 0.5] [--top-k 5]
       [--code-type icd10|cpt|both] [--explain CODE] [--output out.json] [--config configs/config.json]`;

const optionsSchema = z.object({
  threshold: z.coerce.number().min(0).max(1).optional(),
  topK: z.coerce.number().int().min(0).optional(),
  codeType: z.enum(['icd10', 'cpt', 'both']).default('both'),
});

async function readNote(text: string | undefined, file: string | undefined): Promise<string> {
  if (text !== undefined) return text;
  if (file !== undefined) return readFile(file, 'utf8');
  throw new Error('Either --text or --file is required');
}

export function formatPrediction(prediction: Prediction): string {
  return `${prediction.code} (${prediction.type}): ${prediction.description} (Confidence: ${prediction.confidence.toFixed(2)})`;
}

export function formatExplanation(explanation: Explanation): string[] {
  return [
    `Explanation for ${explanation.code} (${explanation.type}): ${explanation.description}`,
    `Confidence: ${explanation.confidence.toFixed(2)}`,
    'Relevant text:',
    ...explanation.relevant_text.map((sentence) => `  - ${sentence}`),
    'Feature importance:',
    ...Object.entries(explanation.feature_importance).map(([feature, weight]) => `  ${feature}: ${weight.toFixed(2)}`),
  ];
}

/** Predicts codes for one note. Bad arguments and unreadable notes reject. */
export async function runCli(argv: readonly string[], io: CliIO = { log: console.log }): Promise<void> {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      text: { type: 'string' },
      file: { type: 'string' },
      threshold: { type: 'string' },
      'top-k': { type: 'string' },
      'code-type': { type: 'string' },
      explain: { type: 'string' },
      output: { type: 'string' },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    io.log(USAGE);
    return;
  }

  const options = optionsSchema.parse({
    threshold: values.threshold,
    topK: values['top-k'],
    codeType: values['code-type'],
  });
  const note = await readNote(values.text, values.file);

  const config = await loadConfig(values.config ?? env.CONFIG_PATH);
  const { codebooks, errors } = await loadCodebooks({
    icd10Path: env.ICD10_CODES_PATH ?? config.paths.icd10_codes,
    cptPath: env.CPT_CODES_PATH ?? config.paths.cpt_codes,
  });
  if (errors.length > 0) {
    console.warn('[codebooks] continuing with rule default descriptions');
  }

  const predictions = predictCodes(
    note,
    {
      threshold: options.threshold ?? config.prediction.threshold,
      topK: options.topK ?? config.prediction.top_k,
      codeType: options.codeType,
    },
    { codebooks, preprocessing: toNormalizeOptions(config.preprocessing), random: io.random }
  );
  const explanation = values.explain ? explainCode(note, values.explain.trim(), codebooks, io.random) : undefined;

  if (values.output) {
    await writeFile(values.output, JSON.stringify({ predictions, explanation }, null, 2));
    console.info(`[cli] wrote ${predictions.length} predictions to ${values.output}`);
    return;
  }

  if (predictions.length === 0) {
    io.log('No codes predicted');
  }
  for (const prediction of predictions) {
    io.log(formatPrediction(prediction));
  }
  if (explanation) {
    io.log('');
    for (const line of formatExplanation(explanation)) io.log(line);
  }
}

export type { CliIO };
