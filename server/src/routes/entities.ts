import { Router } from 'express';
import { z } from 'zod';
import { toNormalizeOptions } from '../config';
import type { ServiceContext } from '../context';
import { extractEntities, filterEntities, normalizeEntities } from '../services/entityExtraction';
import { preprocessText } from '../services/textNormalizer';

const entitySchema = z.object({
  text: z.string(),
  entity_types: z.array(z.string()).optional(),
});

export default function entityRoutes(context: ServiceContext): Router {
  const r = Router();

  r.post('/', (req, res, next) => {
    try {
      const body = entitySchema.parse(req.body);
      const text = preprocessText(body.text, toNormalizeOptions(context.config.preprocessing));
      const entities = extractEntities(text, body.entity_types ?? context.config.ner.labels);
      res.json({ entities: normalizeEntities(filterEntities(entities)) });
    } catch (error) {
      next(error);
    }
  });

  return r;
}
