import {
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { isUniqueViolation, User } from '@warden/database';
import {
  RegisterDto,
  LoginDto,
  RegisterResponseDto,
  LoginResponseDto,
  LogoutResponseDto,
  SessionDto,
  UserProfileDto,
} from './dto';
import {
  EmailAlreadyExistsException,
  InvalidCredentialsException,
  NotAuthenticatedException,
} from './exceptions';
import { NO_USER_ID } from './identity';
import { SessionManager } from './session/session-manager';

/** Number of bcrypt salt rounds */
export const BCRYPT_SALT_ROUNDS = 10;

/**
 * AuthService: credential handlers: registration, login, logout, profile.
 *
 * Security considerations:
 * - login() hashes even when the email is unknown so both failure paths
 *   take similar time
 * - Login failures share one message (no user enumeration)
 * - The password hash is never returned in any response
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly sessionManager: SessionManager,
  ) {}

  /**
   * Register a new user account.
   *
   * @throws EmailAlreadyExistsException if email is already taken
   */
  async register(dto: RegisterDto): Promise<RegisterResponseDto> {
    const email = dto.email.toLowerCase();

    // ── Check for existing email ──────────────────────────
    const existingUser = await this.userRepository.findOne({
      where: { email },
    });

    if (existingUser) {
      throw new EmailAlreadyExistsException();
    }

    // ── Hash password ─────────────────────────────────────
    const passwordHash = await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);

    // ── Create user ───────────────────────────────────────
    const user = this.userRepository.create({ email, passwordHash });
    let savedUser: User;
    try {
      savedUser = await this.userRepository.save(user);
    } catch (error) {
      // A concurrent registration can pass the lookup above
      if (isUniqueViolation(error)) {
        throw new EmailAlreadyExistsException();
      }
      throw error;
    }

    this.logger.log(`User registered: ${savedUser.id} (${savedUser.email})`);

    return new RegisterResponseDto(UserProfileDto.fromEntity(savedUser));
  }

  /**
   * Authenticate a user and open a new session for the calling client.
   *
   * @throws InvalidCredentialsException if email doesn't exist or password is wrong
   */
  async login(
    dto: LoginDto,
    clientIp: string,
    userAgent: string,
  ): Promise<LoginResponseDto> {
    // ── Find user by email ────────────────────────────────
    const user = await this.userRepository.findOne({
      where: { email: dto.email.toLowerCase() },
    });

    if (!user) {
      await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);
      throw new InvalidCredentialsException();
    }

    // ── Verify password ───────────────────────────────────
    const isPasswordValid = await bcrypt.compare(
      dto.password,
      user.passwordHash,
    );

    if (!isPasswordValid) {
      throw new InvalidCredentialsException();
    }

    // ── Issue session ─────────────────────────────────────
    const issued = await this.sessionManager.issue(user, clientIp, userAgent);
    if (!issued.ok || !issued.value.token) {
      throw new InternalServerErrorException('Failed to create session');
    }

    this.logger.log(`User logged in: ${user.id} (session ${issued.value.id})`);

    return new LoginResponseDto(
      UserProfileDto.fromEntity(user),
      SessionDto.fromEntity(issued.value, issued.value.token),
    );
  }

  /**
   * End every session of the authenticated user.
   *
   * @throws NotAuthenticatedException if no identity is bound
   */
  async logout(userId: number): Promise<LogoutResponseDto> {
    if (userId === NO_USER_ID) {
      throw new NotAuthenticatedException();
    }

    const invalidated = await this.sessionManager.invalidate(userId);
    if (!invalidated.ok) {
      throw new InternalServerErrorException('Failed to logout');
    }

    this.logger.log(`User logged out: ${userId}`);
    return new LogoutResponseDto();
  }

  /**
   * Get the profile of an authenticated user.
   *
   * @throws InvalidCredentialsException if the user no longer exists
   */
  async getProfile(userId: number): Promise<UserProfileDto> {
    const user = await this.userRepository.findOne({
      where: { id: userId },
    });

    if (!user) {
      this.logger.warn(`Profile requested for non-existent user: ${userId}`);
      throw new InvalidCredentialsException();
    }

    return UserProfileDto.fromEntity(user);
  }
}
