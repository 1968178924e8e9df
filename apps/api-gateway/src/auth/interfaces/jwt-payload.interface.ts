/**
 * Claims signed into every session token.
 *
 * Only `user_id` identifies the bearer; the rest are the registered
 * temporal claims, all in seconds since the epoch.
 */
export interface JwtPayload {
  /** User ID: maps to User.id */
  user_id: number;

  /** Issued at */
  iat: number;

  /** Not before; equal to `iat` for issued sessions */
  nbf: number;

  /** Expires at */
  exp: number;
}

export function isJwtPayload(value: unknown): value is JwtPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (
    !('user_id' in value) ||
    !('iat' in value) ||
    !('nbf' in value) ||
    !('exp' in value)
  ) {
    return false;
  }

  const { user_id: userId, iat, nbf, exp } = value;
  return (
    typeof userId === 'number' &&
    Number.isInteger(userId) &&
    userId > 0 &&
    typeof iat === 'number' &&
    typeof nbf === 'number' &&
    typeof exp === 'number'
  );
}
