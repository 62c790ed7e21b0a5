import express, { Request, Response, NextFunction } from 'express';
import http from 'http';
import cors from 'cors';
import helmet from 'helmet';
import path from 'path';
import { CONFIG, requireToken } from './config';
import { createStatusService, StatusService } from './statusService';
import { StatusQuery } from './types';

function parseQuery(req: Request): StatusQuery {
  const { container, since, tail } = req.query;
  const tailNum = Number(tail);
  return {
    container: typeof container === 'string' && container.trim() ? container.trim() : CONFIG.containerName,
    since: typeof since === 'string' ? since.trim() : '',
    tail: Number.isInteger(tailNum) && tailNum > 0 ? tailNum : CONFIG.defaultTail,
  };
}

export function createServer(service: StatusService = createStatusService(CONFIG)) {
  const app = express();
  app.disable('x-powered-by');
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: CONFIG.corsOrigin === '*' ? true : CONFIG.corsOrigin }));

  function authMiddleware(req: Request, res: Response, next: NextFunction) {
    const token = requireToken();
    if (!token) return next();
    const header = req.headers['authorization'];
    const urlToken = typeof req.query.token === 'string' ? req.query.token : '';
    const bearer = header && header.startsWith('Bearer ') ? header.slice(7) : '';
    if (bearer === token || urlToken === token) return next();
    return res.status(401).json({ ok: false, error: 'unauthorized' });
  }

  app.get('/api/health', (_req: Request, res: Response) => res.json({ ok: true }));

  app.get('/api/status', authMiddleware, (req: Request, res: Response, next: NextFunction) => {
    service
      .getStatus(parseQuery(req))
      .then((result) => {
        if (!result.ok) {
          res.status(result.status).json({ ok: false, error: result.error });
          return;
        }
        res.json(result.snapshot);
      })
      .catch(next);
  });

  app.post('/api/reset_totals', authMiddleware, (_req: Request, res: Response, next: NextFunction) => {
    service
      .resetTotals()
      .then(() => {
        res.json({ ok: true, message: 'Totals reset.' });
      })
      .catch(next);
  });

  // Dashboard page; resolves from both src/ and dist/
  app.use('/', express.static(path.join(__dirname, '..', 'public')));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    // eslint-disable-next-line no-console
    console.error(`[HTTP] ${req.method} ${req.path} failed: ${message}`);
    res.status(500).json({ ok: false, error: message });
  });

  const server = http.createServer(app);
  return { app, server };
}
