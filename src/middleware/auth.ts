import { Request, Response, NextFunction, RequestHandler } from 'express';
import { parseAuthorizationHeader, type TokenVerifier } from '@/auth/tokenVerifier';
import { AuthenticationError } from '@/utils/errors';

/**
 * Resolves the bearer token into `req.principal`.
 * No header means anonymous access; a bad header or token fails the request with 401.
 */
export function authenticateToken(verifier: TokenVerifier): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const header = parseAuthorizationHeader(req.headers.authorization);
    if (!header.success) {
      next(header.error);
      return;
    }

    if (header.token === null) {
      next();
      return;
    }

    const result = verifier.verify(header.token);
    if (!result.success) {
      next(result.error);
      return;
    }

    req.principal = { claims: result.claims, credential: header.token };
    next();
  };
}

/** Rejects anonymous requests before any body or file handling. */
export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
  if (!req.principal) {
    next(new AuthenticationError('not_authenticated'));
    return;
  }
  next();
}
