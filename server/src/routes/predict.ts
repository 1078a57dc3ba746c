import { Router } from 'express';
import { z } from 'zod';
import { toNormalizeOptions } from '../config';
import type { ServiceContext } from '../context';
import { detectCodes } from '../services/codingEngine';

export default function predictRoutes(context: ServiceContext): Router {
  const r = Router();
  const { config } = context;

  const predictSchema = z.object({
    text: z.string(),
    threshold: z.number().min(0).max(1).default(config.prediction.threshold),
    top_k: z.number().int().min(0).default(config.prediction.top_k),
    code_type: z.enum(['icd10', 'cpt', 'both']).default('both'),
  });

  r.post('/', async (req, res, next) => {
    try {
      const body = predictSchema.parse(req.body);
      const result = await detectCodes(
        {
          text: body.text,
          threshold: body.threshold,
          topK: body.top_k,
          codeType: body.code_type,
          entityTypes: config.ner.labels,
          maxLength: config.preprocessing.max_length,
        },
        {
          codebooks: context.codebooks.current,
          preprocessing: toNormalizeOptions(config.preprocessing),
          random: context.random,
          inference: context.inference,
        }
      );
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return r;
}
