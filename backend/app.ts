import express, {
  type NextFunction,
  type Request,
  type Response,
} from 'express';

import type { ServerConfig } from './config/ServerConfig';
import { createAnalysisRouter } from './modules/analysis/analysis.routes';
import { createCatalogRouter } from './modules/catalog/catalog.routes';
import { createPartsRouter } from './modules/parts/parts.routes';
import { createProjectsRouter } from './modules/projects/projects.routes';
import { sendData, sendError } from './modules/shared/http';
import { telemetryStore } from './telemetry/TelemetryStore';

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'body' in err;

export const createApp = (
  config: Pick<ServerConfig, 'jsonBodyLimit' | 'requestTimeoutMs'>,
) => {
  const app = express();
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.use((req, res, next) => {
    const timer = setTimeout(() => {
      if (res.headersSent) return;
      res.status(504).json({ success: false, errorMessage: 'Gateway Timeout' });
    }, config.requestTimeoutMs);
    res.on('finish', () => clearTimeout(timer));
    res.on('close', () => clearTimeout(timer));
    req.setTimeout(config.requestTimeoutMs);
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/api', createCatalogRouter());
  app.use('/api', createProjectsRouter());
  app.use('/api', createPartsRouter());
  app.use('/api', createAnalysisRouter());

  app.get('/api/telemetry', (_req, res) => {
    sendData(res, telemetryStore.snapshot());
  });

  // Fallback 404 for any unhandled /api route.
  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, errorMessage: 'Not Found' });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isBodyParseError(err)) {
      res
        .status(400)
        .json({ success: false, errorMessage: 'Malformed JSON body.' });
      return;
    }
    sendError(res, err, 'http');
  });

  return app;
};
