// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { Session } from './entities/session.entity';
export { RecordMetadata } from './entities/record-metadata';

// ── Errors ──────────────────────────────────────────────────
export { isUniqueViolation } from './errors';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
