import { CreateDateColumn, DeleteDateColumn, UpdateDateColumn } from 'typeorm';

/**
 * Bookkeeping columns shared by every persisted record.
 *
 * Embedded by field (`@Column(() => RecordMetadata, { prefix: false })`)
 * so the columns land directly on the owning table.
 */
export class RecordMetadata {
  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  /** Soft-delete marker. Rows with a value here are hidden from finds. */
  @DeleteDateColumn({ type: 'timestamptz', name: 'deleted_at', nullable: true })
  deletedAt!: Date | null;
}
