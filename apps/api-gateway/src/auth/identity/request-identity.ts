import type { AuthenticatedRequest, RequestUser } from '../interfaces';

/** Returned by {@link getUserId} when no identity is bound. */
export const NO_USER_ID = 0;

/** Attach the identity resolved by the auth gate to the request. */
export function bindIdentity<TRequest extends object>(
  request: TRequest,
  identity: RequestUser,
): TRequest & Pick<AuthenticatedRequest, 'user'> {
  return Object.assign(request, { user: identity });
}

/**
 * Read the authenticated user id from a request.
 *
 * Never throws: returns {@link NO_USER_ID} when nothing is bound or the
 * bound value is not a positive integer id.
 */
export function getUserId(request: object): number {
  if (!('user' in request)) {
    return NO_USER_ID;
  }

  const { user } = request;
  if (typeof user !== 'object' || user === null || !('userId' in user)) {
    return NO_USER_ID;
  }

  const { userId } = user;
  return typeof userId === 'number' && Number.isInteger(userId) && userId > 0
    ? userId
    : NO_USER_ID;
}
