import { ConfigService } from '@nestjs/config';
import { readBoolean, readPositiveInteger } from '../common/config';

/** Injection token for the resolved {@link AuthOptions}. */
export const AUTH_OPTIONS = Symbol('AUTH_OPTIONS');

/** Default session lifetime: 24 hours. */
export const DEFAULT_SESSION_TTL_SECONDS = 24 * 60 * 60;

export interface AuthOptions {
  /** HMAC signing key. Never log or serialize. */
  readonly secret: string;
  readonly sessionTtlSeconds: number;
  /** Reject tokens whose session row is gone (e.g. after logout). */
  readonly enforceSessionRecord: boolean;
}

/**
 * Resolve auth options from the environment once, at startup.
 *
 * Throws when JWT_SECRET_KEY is missing so the application refuses to boot
 * rather than failing per request.
 */
export function createAuthOptions(configService: ConfigService): AuthOptions {
  const secret = configService.get<string>('JWT_SECRET_KEY');

  if (!secret) {
    throw new Error('JWT_SECRET_KEY is not defined. Check your .env file.');
  }

  return Object.freeze({
    secret,
    sessionTtlSeconds: readPositiveInteger(
      configService,
      'SESSION_TTL_SECONDS',
      DEFAULT_SESSION_TTL_SECONDS,
    ),
    enforceSessionRecord: readBoolean(
      configService,
      'AUTH_ENFORCE_SESSION_RECORD',
      true,
    ),
  });
}
