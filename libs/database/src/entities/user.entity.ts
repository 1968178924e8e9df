import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  OneToMany,
  Index,
} from 'typeorm';
import { RecordMetadata } from './record-metadata';
import { Session } from './session.entity';

/**
 * User entity: a registered account that sessions are issued for.
 *
 * Invariants:
 * - Email must be unique across all users (stored lower-cased)
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Deleting a user cascades to all their sessions
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column(() => RecordMetadata, { prefix: false })
  meta!: RecordMetadata;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Session, (session) => session.user, { cascade: false })
  sessions!: Session[];
}
