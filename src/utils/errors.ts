/**
 * Error taxonomy shared by the service and the HTTP layer.
 * Every error carries the status code it maps to at the API boundary.
 */

export interface FieldError {
  path: string;
  message: string;
}

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type AuthenticationReason =
  | 'not_authenticated'
  | 'malformed_header'
  | 'invalid_token'
  | 'wrong_token_type';

const AUTHENTICATION_MESSAGES: Record<AuthenticationReason, string> = {
  not_authenticated: 'Authentication credentials were not provided.',
  malformed_header: 'Invalid Authorization header format.',
  invalid_token: 'Invalid or expired token.',
  wrong_token_type: 'Token is not an access token.',
};

export class AuthenticationError extends AppError {
  readonly statusCode = 401;
  readonly code = 'authentication_failed';

  constructor(readonly reason: AuthenticationReason) {
    super(AUTHENTICATION_MESSAGES[reason]);
  }
}

export class AuthorizationError extends AppError {
  readonly statusCode = 403;
  readonly code = 'permission_denied';
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'invalid';

  constructor(message: string, readonly errors: FieldError[] = []) {
    super(message);
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'not_found';

  constructor(message = 'Not found.') {
    super(message);
  }
}

export type DependencyReason = 'directory_unavailable' | 'no_shops_found';

/** Shared user-visible message: an unreachable directory and an owner without shops look the same. */
export const NO_SHOP_FOUND_MESSAGE = 'No shop found for this owner';

/**
 * Failure of the shop directory lookup. Surfaced as a permission denial,
 * while `reason` and `cause` stay available to the logs.
 */
export class DependencyError extends AppError {
  readonly statusCode = 403;
  readonly code = 'permission_denied';

  constructor(readonly reason: DependencyReason, readonly detail?: string) {
    super(NO_SHOP_FOUND_MESSAGE);
  }
}
