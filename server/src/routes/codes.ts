import { Router } from 'express';
import type { ServiceContext } from '../context';
import { summarizeCode } from '../services/codeLookup';

export default function codeRoutes(context: ServiceContext): Router {
  const r = Router();

  r.post('/reload', async (_req, res, next) => {
    try {
      const summary = await context.codebooks.reload();
      if (summary.errors.length > 0) {
        console.warn('[codebooks] reload finished with errors', summary.errors);
      }
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  r.get('/:code', (req, res) => {
    res.json(summarizeCode(req.params.code.trim().toUpperCase(), context.codebooks.current));
  });

  return r;
}
