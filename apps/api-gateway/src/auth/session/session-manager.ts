import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Session, User } from '@warden/database';
import { err, ok, type Result } from '../../common/result';
import { AUTH_OPTIONS, type AuthOptions } from '../auth.options';
import { TokenCodec } from '../token/token-codec';
import type { SessionError, TokenError } from '../interfaces';

/** Identity carried by a verified bearer token. */
export interface VerifiedCredential {
  userId: number;
  /** Expiry from the signed claims; equal to the issuing session's `expiresAt`. */
  expiresAt: Date;
}

/**
 * SessionManager: owns the signing secret and the session lifecycle.
 *
 * The only component that calls the TokenCodec for sessions. Failures are
 * returned as Result values; translating them into HTTP responses is left
 * to the auth gate and the credential handlers.
 *
 * Concurrent issue() calls for the same user are not coordinated: each
 * produces an independent session, and a user may hold many at once.
 */
@Injectable()
export class SessionManager {
  private readonly logger = new Logger(SessionManager.name);

  constructor(
    @Inject(AUTH_OPTIONS)
    private readonly options: AuthOptions,
    private readonly tokenCodec: TokenCodec,
    @InjectRepository(Session)
    private readonly sessionRepository: Repository<Session>,
  ) {}

  /** Whether admitted requests must also match a live session row. */
  get enforcesSessionRecord(): boolean {
    return this.options.enforceSessionRecord;
  }

  /**
   * Sign a token for `user` and persist a new session for it.
   * The returned session carries the token; the stored row does not.
   */
  async issue(
    user: Pick<User, 'id'>,
    clientIp: string,
    userAgent: string,
    now: Date = new Date(),
  ): Promise<Result<Session, TokenError | SessionError>> {
    const encoded = this.tokenCodec.encode(
      user.id,
      this.options.secret,
      this.options.sessionTtlSeconds,
      now,
    );
    if (!encoded.ok) {
      this.logger.error(
        `Token signing failed for user ${user.id}: ${encoded.error.code}`,
      );
      return encoded;
    }

    const session = this.sessionRepository.create({
      userId: user.id,
      expiresAt: encoded.value.expiresAt,
    });
    session.updateLastUsed(clientIp, userAgent, now);
    session.token = encoded.value.token;

    try {
      const saved = await this.sessionRepository.save(session);
      return ok(saved);
    } catch (error) {
      this.logger.error(
        `Failed to persist session for user ${user.id}`,
        error instanceof Error ? error.stack : String(error),
      );
      return err({
        code: 'session.store_failed',
        message: 'Failed to create session',
      });
    }
  }

  /**
   * Soft-delete every session of `userId`. This revokes all devices, not
   * just the one that asked.
   *
   * @returns number of sessions removed
   */
  async invalidate(userId: number): Promise<Result<number, SessionError>> {
    try {
      const result = await this.sessionRepository.softDelete({ userId });
      const removed = result.affected ?? 0;
      this.logger.log(`Invalidated ${removed} session(s) for user ${userId}`);
      return ok(removed);
    } catch (error) {
      this.logger.error(
        `Failed to invalidate sessions for user ${userId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return err({
        code: 'session.store_failed',
        message: 'Failed to invalidate sessions',
      });
    }
  }

  /**
   * Decode a bearer token with the owned secret and return the user id
   * together with the signed expiry that identifies its session.
   */
  decodeAndValidate(
    token: string,
    now: Date = new Date(),
  ): Result<VerifiedCredential, TokenError> {
    const decoded = this.tokenCodec.decode(token, this.options.secret, now);
    if (!decoded.ok) {
      return decoded;
    }
    return ok({
      userId: decoded.value.user_id,
      expiresAt: new Date(decoded.value.exp * 1000),
    });
  }

  /**
   * Refresh the usage metadata of the live session a verified token was
   * issued for. The session is found by user id and signed expiry; two
   * sessions only share both when they were issued in the same second and
   * so carry the same token.
   *
   * @returns the updated session, or `null` when that session no longer
   *          exists (logged out)
   */
  async recordUse(
    credential: VerifiedCredential,
    clientIp: string,
    userAgent: string,
    now: Date = new Date(),
  ): Promise<Result<Session | null, SessionError>> {
    const { userId, expiresAt } = credential;
    try {
      const session = await this.sessionRepository.findOne({
        where: { userId, expiresAt },
        order: { id: 'DESC' },
      });

      if (!session) {
        return ok(null);
      }

      session.updateLastUsed(clientIp, userAgent, now);
      return ok(await this.sessionRepository.save(session));
    } catch (error) {
      this.logger.error(
        `Failed to record session use for user ${userId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return err({
        code: 'session.store_failed',
        message: 'Failed to load session',
      });
    }
  }
}
