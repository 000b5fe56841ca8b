/**
 * Server utility functions
 */

import type { Request } from 'express';
import { NotFoundError } from './errors';

/** Absolute origin of the current request, e.g. `http://localhost:4000`. */
export function requestOrigin(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

/** Absolute URL uploaded files are served from. */
export function mediaBaseUrl(req: Request): string {
  return `${requestOrigin(req)}/uploads`;
}

/**
 * Link to another page of the current query. Page 1 drops the parameter.
 */
export function pageUrl(req: Request, page: number): string {
  const url = new URL(req.originalUrl, requestOrigin(req));
  if (page <= 1) {
    url.searchParams.delete('page');
  } else {
    url.searchParams.set('page', String(page));
  }
  return url.toString();
}

/** Numeric route id; anything else is a 404 like any unknown resource. */
export function parseId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new NotFoundError();
  }
  return Number(raw);
}
