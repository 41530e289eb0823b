/**
 * HTTP endpoint: POST /extract, GET /platforms, GET /health.
 */
import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { logger } from './logger.js';
import { toErrorResponse, ValidationError } from './errors.js';
import type { ImageExtractionService } from './extract/extraction-service.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** body-parser marks JSON syntax errors with this type. */
function isBodyParseError(error: unknown): boolean {
  return isRecord(error) && error.type === 'entity.parse.failed';
}

function sendError(res: Response, error: unknown): void {
  const { status, body } = toErrorResponse(error);
  res.status(status).json(body);
}

export function createApp(service: ImageExtractionService): Express {
  const app = express();

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    res.on('finish', () => {
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startTime,
        },
        'Request handled'
      );
    });
    next();
  });

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      platforms: service.getSupportedPlatforms(),
    });
  });

  app.get('/platforms', (_req: Request, res: Response) => {
    res.json({ platforms: service.getSupportedPlatforms() });
  });

  app.post('/extract', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    try {
      if (!isRecord(body)) {
        throw new ValidationError('body', body, 'Request body must be a JSON object');
      }
      const result = await service.extract(body.url, body.options);
      res.json(result);
    } catch (error) {
      sendError(res, error);
    }
  });

  // Express recognizes error middleware by its four parameters.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      sendError(res, new ValidationError('body', undefined, 'Malformed JSON body'));
      return;
    }
    logger.error({ error: String(error) }, 'Unhandled request error');
    sendError(res, error);
  });

  return app;
}

/** Listen on `port` (0 picks a free one) and resolve once bound. */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      logger.info({ address: server.address() }, 'Image extraction service listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
