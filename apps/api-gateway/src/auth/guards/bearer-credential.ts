import { err, ok, type Result } from '../../common/result';
import { AuthRejectReason } from './auth-reject-reason';

export const BEARER_PREFIX = 'Bearer ';

/**
 * Pull the bearer credential out of an Authorization header value.
 *
 * Checks run in a fixed order and stop at the first failure: header
 * present, then `Bearer ` prefix, then a non-empty credential. The scheme
 * is case-sensitive.
 *
 * HTTP parsers strip trailing whitespace from header values, so `Bearer `
 * sent by a client arrives as `Bearer`; both mean "no credential".
 */
export function readBearerCredential(
  header: string | undefined,
): Result<string, AuthRejectReason> {
  if (!header) {
    return err(AuthRejectReason.AUTH_HEADER_REQUIRED);
  }

  if (header === BEARER_PREFIX.trimEnd()) {
    return err(AuthRejectReason.CREDENTIAL_REQUIRED);
  }

  if (!header.startsWith(BEARER_PREFIX)) {
    return err(AuthRejectReason.SCHEME_MISMATCH);
  }

  const credential = header.slice(BEARER_PREFIX.length);
  if (!credential) {
    return err(AuthRejectReason.CREDENTIAL_REQUIRED);
  }

  return ok(credential);
}
