import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { RecordMetadata } from './record-metadata';
import { User } from './user.entity';

export const LAST_USED_IP_LENGTH = 64;
export const LAST_USED_LOC_LENGTH = 512;

/**
 * Session entity: one issued bearer credential and its usage metadata.
 *
 * Invariants:
 * - `userId` never changes after creation
 * - `expiresAt` is copied from the signed token's `exp` claim at issuance
 * - The token itself is not persisted; it is only present on the instance
 *   returned from issuance
 * - Logout soft-deletes every session of the user
 */
@Entity('sessions')
@Index('IDX_sessions_user_expires', ['userId', 'expiresAt'])
export class Session {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IDX_sessions_user_id')
  @Column({ type: 'int', name: 'user_id' })
  userId!: number;

  @Column({ type: 'timestamptz', name: 'expires_at' })
  expiresAt!: Date;

  @Column({ type: 'timestamptz', name: 'last_used_at' })
  lastUsedAt!: Date;

  @Column({ type: 'varchar', length: LAST_USED_IP_LENGTH, name: 'last_used_ip', default: '' })
  lastUsedIp!: string;

  /** User agent of the last request that used this session. */
  @Column({ type: 'varchar', length: LAST_USED_LOC_LENGTH, name: 'last_used_loc', default: '' })
  lastUsedLoc!: string;

  @Column(() => RecordMetadata, { prefix: false })
  meta!: RecordMetadata;

  /** Signed bearer token, set only when the session was just issued. */
  token?: string;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.sessions, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'user_id' })
  user!: User;

  /**
   * Record a use of this session. Values longer than their columns are
   * truncated. Mutates the instance only; callers persist it.
   */
  updateLastUsed(ip: string, userAgent: string, at: Date = new Date()): void {
    this.lastUsedAt = at;
    this.lastUsedIp = ip.slice(0, LAST_USED_IP_LENGTH);
    this.lastUsedLoc = userAgent.slice(0, LAST_USED_LOC_LENGTH);
  }
}
