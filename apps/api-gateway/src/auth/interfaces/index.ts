export type { JwtPayload } from './jwt-payload.interface';
export { isJwtPayload } from './jwt-payload.interface';
export type {
  RequestUser,
  AuthenticatedRequest,
} from './authenticated-request.interface';
export type {
  AuthError,
  TokenError,
  TokenErrorCode,
  SessionError,
  SessionErrorCode,
} from './auth-error.interface';
