import {
  CanActivate,
  ExecutionContext,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import type { Request } from 'express';
import { SessionManager } from '../session/session-manager';
import { AuthRejectedException } from '../exceptions';
import { bindIdentity } from '../identity';
import { AuthRejectReason } from './auth-reject-reason';
import { readBearerCredential } from './bearer-credential';

/**
 * Auth gate: protects routes that require a session.
 *
 * Usage:
 * ```ts
 * @UseGuards(AuthGate)
 * @Get('protected')
 * getProtected(@CurrentUser() user: RequestUser): string {
 *   return `Hello ${user.userId}`;
 * }
 * ```
 *
 * Checks, in order, stopping at the first failure:
 * 1. Authorization header present
 * 2. `Bearer ` scheme
 * 3. Non-empty credential
 * 4. Token decodes under the session secret (expired vs otherwise invalid)
 * 5. When session records are enforced: the token's session still exists
 *
 * On success the user id is bound to `request.user`. A rejection ends the
 * request with 401 and no handler runs.
 */
@Injectable()
export class AuthGate implements CanActivate {
  private readonly logger = new Logger(AuthGate.name);

  constructor(private readonly sessionManager: SessionManager) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();

    const credential = readBearerCredential(request.headers.authorization);
    if (!credential.ok) {
      throw this.reject(credential.error);
    }

    const decoded = this.sessionManager.decodeAndValidate(credential.value);
    if (!decoded.ok) {
      throw this.reject(
        decoded.error.code === 'token.expired'
          ? AuthRejectReason.TOKEN_EXPIRED
          : AuthRejectReason.TOKEN_INVALID,
      );
    }

    const { userId } = decoded.value;

    if (this.sessionManager.enforcesSessionRecord) {
      const used = await this.sessionManager.recordUse(
        decoded.value,
        request.ip ?? '',
        request.headers['user-agent'] ?? '',
      );
      if (!used.ok) {
        throw new InternalServerErrorException('Failed to load session');
      }
      if (!used.value) {
        throw this.reject(AuthRejectReason.SESSION_REVOKED);
      }
    }

    bindIdentity(request, { userId });
    return true;
  }

  private reject(reason: AuthRejectReason): AuthRejectedException {
    this.logger.debug(`Auth gate rejected request: ${reason}`);
    return new AuthRejectedException(reason);
  }
}
