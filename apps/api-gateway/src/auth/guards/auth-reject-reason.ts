/**
 * Why the auth gate turned a request away. Sent to clients as `reason`
 * next to the human-readable message.
 */
export enum AuthRejectReason {
  AUTH_HEADER_REQUIRED = 'AUTH_HEADER_REQUIRED',
  SCHEME_MISMATCH = 'SCHEME_MISMATCH',
  CREDENTIAL_REQUIRED = 'CREDENTIAL_REQUIRED',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  TOKEN_INVALID = 'TOKEN_INVALID',
  SESSION_REVOKED = 'SESSION_REVOKED',
}

export const AUTH_REJECT_MESSAGES: Record<AuthRejectReason, string> = {
  [AuthRejectReason.AUTH_HEADER_REQUIRED]: 'Authorization header is required',
  [AuthRejectReason.SCHEME_MISMATCH]: "Authorization header must start with 'Bearer'",
  [AuthRejectReason.CREDENTIAL_REQUIRED]: 'Token is required',
  [AuthRejectReason.TOKEN_EXPIRED]: 'Token has expired',
  [AuthRejectReason.TOKEN_INVALID]: 'Invalid token',
  [AuthRejectReason.SESSION_REVOKED]: 'Session is no longer active',
};
