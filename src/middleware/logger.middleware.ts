import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';

const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Request logging middleware
 *
 * Tags each request with an id (the caller's X-Request-Id, or a fresh uuid),
 * echoes it on the response and logs completion at a level matching the status.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  const requestId = req.get(REQUEST_ID_HEADER)?.slice(0, 128) || uuidv4();

  res.setHeader(REQUEST_ID_HEADER, requestId);

  logger.debug('Incoming request', {
    requestId,
    method: req.method,
    path: req.path,
    query: req.query,
    body: req.body,
    ip: req.ip,
  });

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

    logger.log(level, 'Request completed', {
      requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
    });
  });

  next();
};
