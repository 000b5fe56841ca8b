import jwt from 'jsonwebtoken';
import type { AppConfig } from '@/config/app.config';
import { AuthenticationError } from '@/utils/errors';
import { ACCESS_TOKEN_TYPE, decodeClaims, type Claims } from './claims';

export type VerifyResult =
  | { success: true; claims: Claims }
  | { success: false; error: AuthenticationError };

export type HeaderParseResult =
  | { success: true; token: string | null }
  | { success: false; error: AuthenticationError };

/**
 * Splits an `Authorization` header into its bearer token.
 * A missing header yields `token: null` (anonymous access).
 */
export function parseAuthorizationHeader(header: string | undefined): HeaderParseResult {
  if (!header) {
    return { success: true, token: null };
  }

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return { success: false, error: new AuthenticationError('malformed_header') };
  }

  return { success: true, token: parts[1] };
}

/**
 * Local verification of access tokens issued by the identity service,
 * against the pre-shared key and the single configured algorithm.
 */
export class TokenVerifier {
  private readonly key: string;
  private readonly algorithm: jwt.Algorithm;

  constructor(config: Pick<AppConfig, 'jwt'>) {
    this.key = config.jwt.secretKey;
    this.algorithm = config.jwt.algorithm;
  }

  verify(rawToken: string): VerifyResult {
    const token = rawToken.trim();
    if (token.length === 0 || /\s/.test(token)) {
      return { success: false, error: new AuthenticationError('malformed_header') };
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.key, { algorithms: [this.algorithm] });
    } catch {
      return { success: false, error: new AuthenticationError('invalid_token') };
    }

    if (typeof payload === 'string') {
      return { success: false, error: new AuthenticationError('invalid_token') };
    }

    // the token type is judged before the rest of the payload
    const tokenType: unknown = payload.type;
    if (tokenType && tokenType !== ACCESS_TOKEN_TYPE) {
      return { success: false, error: new AuthenticationError('wrong_token_type') };
    }

    const decoded = decodeClaims(payload);
    if (!decoded.success) {
      return { success: false, error: new AuthenticationError('invalid_token') };
    }

    return { success: true, claims: decoded.claims };
  }
}
