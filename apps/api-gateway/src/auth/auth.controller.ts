import {
  Controller,
  Post,
  Get,
  Body,
  Headers,
  Ip,
  UseGuards,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { AuthService } from './auth.service';
import {
  RegisterDto,
  LoginDto,
  RegisterResponseDto,
  LoginResponseDto,
  LogoutResponseDto,
  UserProfileDto,
} from './dto';
import { AuthGate } from './guards';
import { CurrentUser } from './decorators';
import type { RequestUser } from './interfaces';

/**
 * AuthController: REST endpoints for authentication.
 *
 * Routes:
 * - POST /auth/register  → Create a new user account (public)
 * - POST /auth/login     → Authenticate and open a session (public)
 * - POST /auth/logout    → End all sessions of the caller (protected)
 * - GET  /auth/me        → Get current user profile (protected)
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 201 Created with the new user
   * @throws 409 Conflict if email already exists
   * @throws 400 Bad Request if validation fails
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto): Promise<RegisterResponseDto> {
    return this.authService.register(dto);
  }

  /**
   * @returns 200 OK with the user and the new session (including its token)
   * @throws 401 Unauthorized if credentials are invalid
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Body() dto: LoginDto,
    @Ip() clientIp: string,
    @Headers('user-agent') userAgent: string | undefined,
  ): Promise<LoginResponseDto> {
    return this.authService.login(dto, clientIp, userAgent ?? '');
  }

  /**
   * @returns 200 OK with a confirmation message
   * @throws 401 Unauthorized if the bearer token is missing/invalid/expired
   */
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGate)
  async logout(@CurrentUser() user: RequestUser): Promise<LogoutResponseDto> {
    return this.authService.logout(user.userId);
  }

  @Get('me')
  @UseGuards(AuthGate)
  async getProfile(
    @CurrentUser() user: RequestUser,
  ): Promise<UserProfileDto> {
    return this.authService.getProfile(user.userId);
  }
}
