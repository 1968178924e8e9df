// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Guards (for use in other feature modules) ───────────────
export { AuthGate, AuthRejectReason } from './guards';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser } from './decorators';

// ── Identity accessors ──────────────────────────────────────
export { getUserId, NO_USER_ID } from './identity';

// ── Interfaces (for typing in other feature modules) ────────
export type {
  JwtPayload,
  RequestUser,
  AuthenticatedRequest,
} from './interfaces';

// ── DTOs (for reuse if needed) ──────────────────────────────
export { UserProfileDto } from './dto';
