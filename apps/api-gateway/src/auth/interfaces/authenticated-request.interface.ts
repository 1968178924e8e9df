import type { Request } from 'express';

/**
 * Identity bound to a request once the auth gate admits it.
 */
export interface RequestUser {
  userId: number;
}

/**
 * Express Request carrying the identity resolved by the auth gate.
 * Produced by `bindIdentity`; read by `@CurrentUser()`.
 */
export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}
