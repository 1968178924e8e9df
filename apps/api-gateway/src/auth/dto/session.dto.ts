import type { Session } from '@warden/database';

/** Session as returned to the client that just logged in. */
export class SessionDto {
  id: number;
  user_id: number;
  token: string;
  expires_at: Date;
  last_used_at: Date;
  last_used_ip: string;
  last_used_loc: string;

  private constructor(session: Session, token: string) {
    this.id = session.id;
    this.user_id = session.userId;
    this.token = token;
    this.expires_at = session.expiresAt;
    this.last_used_at = session.lastUsedAt;
    this.last_used_ip = session.lastUsedIp;
    this.last_used_loc = session.lastUsedLoc;
  }

  /** `token` is passed separately: stored sessions do not carry one. */
  static fromEntity(session: Session, token: string): SessionDto {
    return new SessionDto(session, token);
  }
}
