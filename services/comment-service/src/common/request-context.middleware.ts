import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { extractClientIp } from '../utils/client-ip.util';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const logger = new Logger('HTTP');

export function getRequestId(response: Response): string | undefined {
  const requestId: unknown = response.locals.requestId;
  return typeof requestId === 'string' ? requestId : undefined;
}

/**
 * Tags every request with a correlation id and logs its outcome.
 */
export function requestContext(request: Request, response: Response, next: NextFunction): void {
  const requestId = randomUUID();
  const startedAt = Date.now();
  const clientIp = extractClientIp(request.headers, request.socket.remoteAddress);

  response.locals.requestId = requestId;
  response.setHeader(REQUEST_ID_HEADER, requestId);

  response.on('finish', () => {
    logger.log(
      `${request.method} ${request.originalUrl} ${response.statusCode} - ${Date.now() - startedAt}ms [${requestId}] ip=${clientIp}`,
    );
  });

  next();
}
