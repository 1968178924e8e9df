import type { User } from '@warden/database';

/**
 * Public user representation: never includes the password hash.
 *
 * Uses a static factory method to enforce that we always map
 * from the entity explicitly, preventing accidental data leaks.
 */
export class UserProfileDto {
  id: number;
  email: string;
  created_at: Date;
  updated_at: Date;

  private constructor(id: number, email: string, createdAt: Date, updatedAt: Date) {
    this.id = id;
    this.email = email;
    this.created_at = createdAt;
    this.updated_at = updatedAt;
  }

  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(
      user.id,
      user.email,
      user.meta.createdAt,
      user.meta.updatedAt,
    );
  }
}
