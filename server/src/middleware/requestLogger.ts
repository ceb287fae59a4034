import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { AsyncLocalStorage } from 'async_hooks';
import { createModuleLogger } from '../services/logger.js';

const log = createModuleLogger('http');

// Use ALS to ensure requestId is available throughout the async chain
export const storage = new AsyncLocalStorage<Map<string, string>>();

export function currentRequestId(): string | undefined {
  return storage.getStore()?.get('requestId');
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
  req.headers['x-request-id'] = requestId; // Pass to downstream handlers
  res.setHeader('X-Request-ID', requestId);

  const store = new Map<string, string>();
  store.set('requestId', requestId);

  storage.run(store, () => {
    const startedAt = Date.now();
    log.debug(`[${requestId}] ${req.method} ${req.originalUrl}`);

    res.on('finish', () => {
      log.info(
        `[${requestId}] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`
      );
    });

    next();
  });
}
