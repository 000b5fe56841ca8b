import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export const CORRELATION_HEADER = 'x-correlation-id';

// caller-supplied ids end up in logs, so only plain tokens are echoed back
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/** Tags the request with the caller's correlation id, or a fresh one. */
export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header(CORRELATION_HEADER);
  const correlationId = incoming !== undefined && CORRELATION_ID_PATTERN.test(incoming) ? incoming : randomUUID();

  req.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
}
