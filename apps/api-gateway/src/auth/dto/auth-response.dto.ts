import { SessionDto } from './session.dto';
import { UserProfileDto } from './user-profile.dto';

/** Response of `POST /auth/register`. */
export class RegisterResponseDto {
  constructor(readonly user: UserProfileDto) {}
}

/** Response of `POST /auth/login`. */
export class LoginResponseDto {
  constructor(
    readonly user: UserProfileDto,
    readonly session: SessionDto,
  ) {}
}

/** Response of `POST /auth/logout`. */
export class LogoutResponseDto {
  readonly message = 'Successfully logged out';
}
