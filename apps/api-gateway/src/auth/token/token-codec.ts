import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Algorithm } from 'jsonwebtoken';
import { err, ok, type Result } from '../../common/result';
import { isJwtPayload } from '../interfaces';
import type { JwtPayload, TokenError } from '../interfaces';

/** Algorithm used to sign new tokens */
export const SIGNING_ALGORITHM: Algorithm = 'HS256';

/**
 * Algorithms accepted on decode. Only the HMAC family: a token whose header
 * names anything else (RS256, none, ...) is rejected before its signature
 * is looked at.
 */
export const ACCEPTED_ALGORITHMS: Algorithm[] = ['HS256', 'HS384', 'HS512'];

export interface EncodedToken {
  token: string;
  expiresAt: Date;
  claims: JwtPayload;
}

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * TokenCodec: signs and verifies session tokens with a symmetric secret.
 *
 * Pure: the secret and the clock are passed in, nothing is read from
 * configuration and nothing is persisted. `expiresAt` returned by
 * `encode()` is derived from the signed `exp` claim, so the two never
 * disagree.
 */
@Injectable()
export class TokenCodec {
  constructor(private readonly jwtService: JwtService) {}

  encode(
    userId: number,
    secret: string,
    ttlSeconds: number,
    now: Date = new Date(),
  ): Result<EncodedToken, TokenError> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      return err({
        code: 'token.invalid_ttl',
        message: `Token TTL must be a positive number of seconds, got ${ttlSeconds}`,
      });
    }

    const issuedAt = toSeconds(now);
    const claims: JwtPayload = {
      user_id: userId,
      iat: issuedAt,
      nbf: issuedAt,
      exp: issuedAt + ttlSeconds,
    };

    try {
      const token = this.jwtService.sign(
        { ...claims },
        { secret, algorithm: SIGNING_ALGORITHM },
      );
      return ok({ token, expiresAt: new Date(claims.exp * 1000), claims });
    } catch (error) {
      return err({
        code: 'token.signing_failed',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Verify signature, algorithm and temporal claims.
   *
   * Expiry is reported as `token.expired` only for tokens whose signature
   * checks out; every other failure is `token.invalid`.
   */
  decode(
    token: string,
    secret: string,
    now: Date = new Date(),
  ): Result<JwtPayload, TokenError> {
    let payload: unknown;

    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        secret,
        algorithms: ACCEPTED_ALGORITHMS,
        clockTimestamp: toSeconds(now),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TokenExpiredError') {
        return err({ code: 'token.expired', message: 'Token has expired' });
      }

      return err({
        code: 'token.invalid',
        message: error instanceof Error ? error.message : 'Invalid token',
      });
    }

    if (!isJwtPayload(payload)) {
      return err({ code: 'token.invalid', message: 'Token claims are malformed' });
    }

    return ok(payload);
  }
}
