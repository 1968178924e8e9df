export type TokenErrorCode =
  | 'token.expired'
  | 'token.invalid'
  | 'token.invalid_ttl'
  | 'token.signing_failed';

export type SessionErrorCode = 'session.store_failed';

export interface AuthError<TCode extends string = TokenErrorCode | SessionErrorCode> {
  readonly code: TCode;
  readonly message: string;
}

export type TokenError = AuthError<TokenErrorCode>;

export type SessionError = AuthError<SessionErrorCode>;
