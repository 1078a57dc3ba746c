import express from 'express';
import cors from 'cors';
import { ZodError } from 'zod';
import type { ServiceContext } from './context';
import predict from './routes/predict';
import explain from './routes/explain';
import entities from './routes/entities';
import codes from './routes/codes';

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createApp(context: ServiceContext) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.use('/api/predict', predict(context));
  app.use('/api/explain', explain(context));
  app.use('/api/extract-entities', entities(context));
  app.use('/api/codes', codes(context));

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ZodError) {
      console.error('[app] request validation error', err.issues);
      res.status(400).json({ error: 'Invalid request', issues: err.issues });
      return;
    }
    const status = statusOf(err);
    const message = err instanceof Error ? err.message : 'Unknown error';
    if (status >= 500) {
      console.error('[app] unhandled error', err);
    }
    res.status(status).json({ error: message });
  });

  return app;
}
