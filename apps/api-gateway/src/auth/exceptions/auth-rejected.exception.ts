import { UnauthorizedException } from '@nestjs/common';
import {
  AUTH_REJECT_MESSAGES,
  AuthRejectReason,
} from '../guards/auth-reject-reason';

/**
 * Thrown by the auth gate when a request is turned away.
 *
 * HTTP 401 Unauthorized. The body carries both the message and a stable
 * `reason` so clients can tell an expired token (re-login) from a
 * malformed one.
 */
export class AuthRejectedException extends UnauthorizedException {
  constructor(readonly reason: AuthRejectReason) {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: AUTH_REJECT_MESSAGES[reason],
      reason,
    });
  }
}
