import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { NormalizeOptions } from './services/textNormalizer';

const DEFAULT_NER_LABELS = ['DIAGNOSIS', 'PROCEDURE', 'MEDICATION', 'SYMPTOM', 'ANATOMY'];

export const configSchema = z.object({
  preprocessing: z
    .object({
      lowercase: z.boolean().default(true),
      remove_punctuation: z.boolean().default(false),
      expand_abbreviations: z.boolean().default(true),
      max_length: z.number().int().positive().default(512),
    })
    .default({}),
  prediction: z
    .object({
      threshold: z.number().min(0).max(1).default(0.5),
      top_k: z.number().int().min(0).default(5),
    })
    .default({}),
  ner: z
    .object({
      labels: z.array(z.string()).default(DEFAULT_NER_LABELS),
    })
    .default({}),
  paths: z
    .object({
      icd10_codes: z.string().default('server/data/reference/icd10_codes.csv'),
      cpt_codes: z.string().default('server/data/reference/cpt_codes.csv'),
    })
    .default({}),
  api: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(4000),
    })
    .default({}),
  sagemaker: z
    .object({
      region: z.string().default('us-west-2'),
    })
    .default({}),
});

export type ServiceConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: ServiceConfig = configSchema.parse({});

/** Missing or invalid config files fall back to defaults; the failure is logged. */
export async function loadConfig(configPath: string): Promise<ServiceConfig> {
  try {
    const raw = await readFile(configPath, 'utf8');
    return configSchema.parse(JSON.parse(raw));
  } catch (error) {
    console.error(`[config] Error loading configuration from ${configPath}, using defaults`, error instanceof Error ? error.message : error);
    return DEFAULT_CONFIG;
  }
}

/** Environment values win over the config file. */
export function resolveListenAddress(
  api: ServiceConfig['api'],
  overrides: { host?: string; port?: number }
): { host: string; port: number } {
  return { host: overrides.host ?? api.host, port: overrides.port ?? api.port };
}

export function toNormalizeOptions(preprocessing: ServiceConfig['preprocessing']): NormalizeOptions {
  return {
    lowercase: preprocessing.lowercase,
    removePunctuation: preprocessing.remove_punctuation,
    expandAbbreviations: preprocessing.expand_abbreviations,
  };
}
