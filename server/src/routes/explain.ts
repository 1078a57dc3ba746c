import { Router } from 'express';
import { z } from 'zod';
import type { ServiceContext } from '../context';
import { explainCode } from '../services/explainer';

const explainSchema = z.object({
  text: z.string(),
  code: z.string().trim().min(1),
});

export default function explainRoutes(context: ServiceContext): Router {
  const r = Router();

  r.post('/', (req, res, next) => {
    try {
      const body = explainSchema.parse(req.body);
      res.json(explainCode(body.text, body.code, context.codebooks.current, context.random));
    } catch (error) {
      next(error);
    }
  });

  return r;
}
