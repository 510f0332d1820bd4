import { randomUUID } from 'crypto';
import type { RequestHandler } from 'express';

import { logInfo } from './logger';

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

export function applyRequestTracing(): RequestHandler {
  return (req, res, next) => {
    const header = req.headers['x-request-id'];
    const incoming = Array.isArray(header) ? header[0] : header;
    const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
    const started = process.hrtime.bigint();

    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
      logInfo('http_request', {
        requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10
      });
    });

    next();
  };
}
