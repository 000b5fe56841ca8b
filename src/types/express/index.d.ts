import type { Principal } from '@/auth/claims';

declare global {
  namespace Express {
    interface Request {
      /** Set by the auth middleware when the request carries a valid access token. */
      principal?: Principal;
      correlationId?: string;
    }
  }
}

export {};
